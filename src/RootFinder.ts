/**
 * Root finder service.
 *
 * A Context.Tag whose implementation carries a resolved set of solver
 * options, so programs can ask for roots without threading tolerances and
 * caps through every call. Layers build it from explicit options, from the
 * library defaults, or from `Config`.
 *
 * @since 0.1.0
 */

import { Config, Context, Effect, Layer } from "effect"
import {
  RootFinderTypeId,
  type ConvergenceError,
  type InvalidBracketError,
  type InvalidSolverOptionsError,
} from "./Errors.js"
import {
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_TOLERANCE,
  resolveSolveOptions,
  type ResolvedSolveOptions,
  type SolveOptions,
} from "./Options.js"
import { runBisection, runNewtonRaphson, runSolve } from "./RootFinding.js"
import type { ScalarFunction } from "./Types.js"

const rootFinderIdentifier = Symbol.keyFor(RootFinderTypeId) ?? "effect-root-finding/RootFinder"

/**
 * @since 0.1.0
 */
export interface RootFinderService {
  readonly options: ResolvedSolveOptions
  readonly newtonRaphson: (
    f: ScalarFunction,
    df: ScalarFunction,
    x0: number,
  ) => Effect.Effect<number, ConvergenceError>
  readonly bisection: (
    f: ScalarFunction,
    x0: number,
    x1: number,
  ) => Effect.Effect<number, ConvergenceError | InvalidBracketError>
  readonly solve: (
    f: ScalarFunction,
    df: ScalarFunction,
    x0: number,
    x1: number,
  ) => Effect.Effect<number, ConvergenceError | InvalidBracketError>
}

/**
 * Solver options read from configuration, under `ROOT_FINDING`:
 * `TOLERANCE`, `NEWTON_MAX_ITERATIONS` and `BISECTION_MAX_ITERATIONS`.
 *
 * @category Config
 * @since 0.1.0
 */
export const RootFinderConfig: Config.Config<Required<SolveOptions>> = Config.all({
  tolerance: Config.number("TOLERANCE").pipe(Config.withDefault(DEFAULT_TOLERANCE)),
  newtonMaxIterations: Config.integer("NEWTON_MAX_ITERATIONS").pipe(
    Config.withDefault(DEFAULT_MAX_ITERATIONS),
  ),
  bisectionMaxIterations: Config.integer("BISECTION_MAX_ITERATIONS").pipe(
    Config.withDefault(DEFAULT_MAX_ITERATIONS),
  ),
}).pipe(Config.nested("ROOT_FINDING"))

const makeService = (options: ResolvedSolveOptions): RootFinderService => ({
  options,
  newtonRaphson: (f, df, x0) =>
    runNewtonRaphson(f, df, x0, {
      tolerance: options.tolerance,
      maxIterations: options.newtonMaxIterations,
    }),
  bisection: (f, x0, x1) =>
    runBisection(f, x0, x1, {
      tolerance: options.tolerance,
      maxIterations: options.bisectionMaxIterations,
    }),
  solve: (f, df, x0, x1) => runSolve(f, df, x0, x1, options),
})

/**
 * Context tag for the root finder.
 *
 * @category Services
 * @since 0.1.0
 */
export class RootFinder extends Context.Tag(rootFinderIdentifier)<RootFinder, RootFinderService>() {
  /**
   * Root finder with explicit options. Building the layer fails if an
   * option is out of range.
   *
   * @example
   * ```ts
   * const root = Effect.runSync(
   *   Effect.flatMap(RootFinder, (finder) => finder.solve(f, df, 1, 2)).pipe(
   *     Effect.provide(RootFinder.layer({ tolerance: 1e-10 })),
   *   ),
   * )
   * ```
   *
   * @category Layers
   * @since 0.1.0
   */
  static layer(options?: SolveOptions): Layer.Layer<RootFinder, InvalidSolverOptionsError> {
    return Layer.effect(this, Effect.map(resolveSolveOptions(options), makeService))
  }

  /**
   * Root finder with the library defaults: tolerance `1e-5`, 20 iterations
   * per stage.
   *
   * @category Layers
   * @since 0.1.0
   */
  static readonly Default = RootFinder.layer()

  /**
   * Root finder configured through `RootFinderConfig`.
   *
   * @category Layers
   * @since 0.1.0
   */
  static readonly fromConfig = Layer.effect(
    this,
    Effect.gen(function* () {
      const configured = yield* RootFinderConfig
      const resolved = yield* resolveSolveOptions(configured)
      yield* Effect.logDebug(
        `Root finder configured: tolerance=${resolved.tolerance}, newtonMaxIterations=${resolved.newtonMaxIterations}, bisectionMaxIterations=${resolved.bisectionMaxIterations}`,
      )
      return makeService(resolved)
    }),
  )
}
