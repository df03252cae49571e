/**
 * Root-finding error hierarchy.
 *
 * Every failure a solver can produce is a tagged error, so callers can
 * recover from one kind with `Effect.catchTag` and let the others propagate.
 *
 * @since 0.1.0
 */

import { Data } from "effect"

/**
 * Unique symbol used to tag root-finding services within the context graph.
 *
 * @since 0.1.0
 */
export const RootFinderTypeId = Symbol.for("effect-root-finding/RootFinder")

/**
 * Iterative method that produced a result or an error.
 *
 * @since 0.1.0
 */
export type RootFindingMethod = "newton-raphson" | "bisection"

const methodLabel: Record<RootFindingMethod, string> = {
  "newton-raphson": "Newton-Raphson",
  bisection: "Bisection",
}

/**
 * Raised when a solver exceeds its iteration cap before `|f(x)|` drops to
 * the tolerance.
 *
 * `iterations` is the counter value that broke the cap (one more than the
 * cap) and `estimate` is the last x the method computed.
 *
 * @category Errors
 * @since 0.1.0
 * @example
 * ```ts
 * const error = new ConvergenceError({ method: "bisection", iterations: 21, estimate: 1.4142 })
 * yield* Effect.fail(error)
 * ```
 */
export class ConvergenceError extends Data.TaggedError("ConvergenceError")<{
  readonly method: RootFindingMethod
  readonly iterations: number
  readonly estimate: number
}> {
  override get message(): string {
    return `${methodLabel[this.method]} failed to converge after ${this.iterations} iterations (last estimate ${this.estimate})`
  }
}

/**
 * Sign shared by both bracket endpoints when a bracket is rejected.
 *
 * @since 0.1.0
 */
export type BracketSign = "positive" | "negative"

/**
 * Raised by bisection when `f` is strictly positive at both endpoints, or
 * strictly negative at both.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidBracketError extends Data.TaggedError("InvalidBracketError")<{
  readonly sign: BracketSign
  readonly left: number
  readonly right: number
  readonly leftValue: number
  readonly rightValue: number
}> {
  override get message(): string {
    return `f(x) ${this.sign} for both endpoints.`
  }
}

/**
 * Raised before any evaluation of `f` when a tolerance or an iteration cap
 * is out of range.
 *
 * @category Errors
 * @since 0.1.0
 */
export class InvalidSolverOptionsError extends Data.TaggedError("InvalidSolverOptionsError")<{
  readonly option: string
  readonly value: number
  readonly expected: string
}> {
  override get message(): string {
    return `Invalid ${this.option} ${this.value}: expected ${this.expected}`
  }
}

/**
 * Failures produced while iterating.
 *
 * @category Errors
 * @since 0.1.0
 */
export type RootFindingError = ConvergenceError | InvalidBracketError
