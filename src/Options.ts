/**
 * Solver options, their defaults and validation.
 *
 * @since 0.1.0
 */

import { Effect, Schema } from "effect"
import { InvalidSolverOptionsError } from "./Errors.js"
import { IterationCap, Tolerance } from "./Types.js"

/**
 * @since 0.1.0
 */
export const DEFAULT_TOLERANCE = 1e-5

/**
 * @since 0.1.0
 */
export const DEFAULT_MAX_ITERATIONS = 20

/**
 * Options shared by the single-method solvers.
 *
 * @since 0.1.0
 */
export interface IterationOptions {
  readonly tolerance?: number
  readonly maxIterations?: number
}

/**
 * Options for the composite solver. Each stage has its own cap.
 *
 * @since 0.1.0
 */
export interface SolveOptions {
  readonly tolerance?: number
  readonly newtonMaxIterations?: number
  readonly bisectionMaxIterations?: number
}

/**
 * @since 0.1.0
 */
export interface ResolvedIterationOptions {
  readonly tolerance: Tolerance
  readonly maxIterations: IterationCap
}

/**
 * @since 0.1.0
 */
export interface ResolvedSolveOptions {
  readonly tolerance: Tolerance
  readonly newtonMaxIterations: IterationCap
  readonly bisectionMaxIterations: IterationCap
}

const isTolerance = Schema.is(Tolerance)
const isIterationCap = Schema.is(IterationCap)

const ensureTolerance = (value: number): Effect.Effect<Tolerance, InvalidSolverOptionsError> =>
  isTolerance(value)
    ? Effect.succeed(value)
    : Effect.fail(
        new InvalidSolverOptionsError({ option: "tolerance", value, expected: "a positive number" }),
      )

const ensureIterationCap = (
  option: string,
  value: number,
): Effect.Effect<IterationCap, InvalidSolverOptionsError> =>
  isIterationCap(value)
    ? Effect.succeed(value)
    : Effect.fail(
        new InvalidSolverOptionsError({ option, value, expected: "a non-negative integer" }),
      )

/**
 * Fill in defaults and validate options for `newtonRaphson` and `bisection`.
 *
 * @since 0.1.0
 */
export const resolveIterationOptions = (
  options?: IterationOptions,
): Effect.Effect<ResolvedIterationOptions, InvalidSolverOptionsError> =>
  Effect.gen(function* () {
    const tolerance = yield* ensureTolerance(options?.tolerance ?? DEFAULT_TOLERANCE)
    const maxIterations = yield* ensureIterationCap(
      "maxIterations",
      options?.maxIterations ?? DEFAULT_MAX_ITERATIONS,
    )
    return { tolerance, maxIterations }
  })

/**
 * Fill in defaults and validate options for `solve`.
 *
 * @since 0.1.0
 */
export const resolveSolveOptions = (
  options?: SolveOptions,
): Effect.Effect<ResolvedSolveOptions, InvalidSolverOptionsError> =>
  Effect.gen(function* () {
    const tolerance = yield* ensureTolerance(options?.tolerance ?? DEFAULT_TOLERANCE)
    const newtonMaxIterations = yield* ensureIterationCap(
      "newtonMaxIterations",
      options?.newtonMaxIterations ?? DEFAULT_MAX_ITERATIONS,
    )
    const bisectionMaxIterations = yield* ensureIterationCap(
      "bisectionMaxIterations",
      options?.bisectionMaxIterations ?? DEFAULT_MAX_ITERATIONS,
    )
    return { tolerance, newtonMaxIterations, bisectionMaxIterations }
  })
