/**
 * Effect-based root finding.
 *
 * Wraps the pure iteration loops with option validation, Debug-level logging
 * and typed failures. Everything here is synchronous and can be run with
 * `Effect.runSync`; results are bit-identical to the pure functions.
 *
 * @since 0.1.0
 */

import { Effect, Either } from "effect"
import type { ConvergenceError, InvalidBracketError, InvalidSolverOptionsError } from "./Errors.js"
import {
  resolveIterationOptions,
  resolveSolveOptions,
  type IterationOptions,
  type ResolvedIterationOptions,
  type ResolvedSolveOptions,
  type SolveOptions,
} from "./Options.js"
import type { ScalarFunction } from "./Types.js"
import { bisectionEither, newtonRaphsonEither } from "./internal/pure.js"

const fromEither = <A, E>(result: Either.Either<A, E>): Effect.Effect<A, E> =>
  Either.isLeft(result) ? Effect.fail(result.left) : Effect.succeed(result.right)

/**
 * Newton-Raphson with options that are already validated.
 *
 * @internal
 */
export const runNewtonRaphson = (
  f: ScalarFunction,
  df: ScalarFunction,
  x0: number,
  options: ResolvedIterationOptions,
): Effect.Effect<number, ConvergenceError> =>
  Effect.suspend(() =>
    fromEither(newtonRaphsonEither(f, df, x0, options.tolerance, options.maxIterations)),
  ).pipe(
    Effect.tap((root) => Effect.logDebug(`Newton-Raphson converged to ${root}`)),
    Effect.withLogSpan("newton-raphson"),
  )

/**
 * Bisection with options that are already validated.
 *
 * @internal
 */
export const runBisection = (
  f: ScalarFunction,
  x0: number,
  x1: number,
  options: ResolvedIterationOptions,
): Effect.Effect<number, ConvergenceError | InvalidBracketError> =>
  Effect.suspend(() =>
    fromEither(bisectionEither(f, x0, x1, options.tolerance, options.maxIterations)),
  ).pipe(
    Effect.tap((root) => Effect.logDebug(`Bisection converged to ${root}`)),
    Effect.withLogSpan("bisection"),
  )

/**
 * Newton-Raphson then bisection, with options that are already validated.
 *
 * @internal
 */
export const runSolve = (
  f: ScalarFunction,
  df: ScalarFunction,
  x0: number,
  x1: number,
  options: ResolvedSolveOptions,
): Effect.Effect<number, ConvergenceError | InvalidBracketError> =>
  runNewtonRaphson(f, df, x0, {
    tolerance: options.tolerance,
    maxIterations: options.newtonMaxIterations,
  }).pipe(
    Effect.catchTag("ConvergenceError", (error) =>
      Effect.gen(function* () {
        yield* Effect.logDebug(
          `Newton-Raphson gave up after ${error.iterations} iterations; falling back to bisection on [${x0}, ${x1}]`,
        )
        return yield* runBisection(f, x0, x1, {
          tolerance: options.tolerance,
          maxIterations: options.bisectionMaxIterations,
        })
      }),
    ),
    Effect.withLogSpan("solve"),
  )

/**
 * Find a root of `f` with Newton-Raphson iteration from `x0`.
 *
 * @example
 * ```ts
 * const root = Effect.runSync(newtonRaphson((x) => x * x - 2, (x) => 2 * x, 1))
 * // 1.4142156862745099
 * ```
 *
 * @since 0.1.0
 */
export const newtonRaphson = (
  f: ScalarFunction,
  df: ScalarFunction,
  x0: number,
  options?: IterationOptions,
): Effect.Effect<number, ConvergenceError | InvalidSolverOptionsError> =>
  resolveIterationOptions(options).pipe(
    Effect.flatMap((resolved) => runNewtonRaphson(f, df, x0, resolved)),
  )

/**
 * Find a root of `f` by bisecting `[x0, x1]`. `f(x0)` and `f(x1)` must not
 * share a strict sign.
 *
 * @since 0.1.0
 */
export const bisection = (
  f: ScalarFunction,
  x0: number,
  x1: number,
  options?: IterationOptions,
): Effect.Effect<number, ConvergenceError | InvalidBracketError | InvalidSolverOptionsError> =>
  resolveIterationOptions(options).pipe(
    Effect.flatMap((resolved) => runBisection(f, x0, x1, resolved)),
  )

/**
 * Find a root of `f` with Newton-Raphson from `x0`, falling back to
 * bisection over `[x0, x1]` if Newton-Raphson does not converge.
 *
 * Only the Newton stage's `ConvergenceError` is recovered; failures of the
 * bisection stage reach the caller unchanged.
 *
 * @example
 * ```ts
 * const root = Effect.runSync(
 *   solve((x) => x * x - 2, (x) => 2 * x, 1, 2, { newtonMaxIterations: 0 })
 * )
 * // 1.414215087890625, found by bisection
 * ```
 *
 * @since 0.1.0
 */
export const solve = (
  f: ScalarFunction,
  df: ScalarFunction,
  x0: number,
  x1: number,
  options?: SolveOptions,
): Effect.Effect<number, ConvergenceError | InvalidBracketError | InvalidSolverOptionsError> =>
  resolveSolveOptions(options).pipe(
    Effect.flatMap((resolved) => runSolve(f, df, x0, x1, resolved)),
  )
