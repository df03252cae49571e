/**
 * Pure Iteration Functions (Layer 1)
 *
 * The solvers themselves, as plain synchronous loops with NO Effect wrapping.
 * Failures are returned as `Either.left` values rather than thrown, so the
 * composite solver can decide on a fallback by inspecting the result.
 *
 * Inputs are not validated here; `Options.ts` does that for the Effect layer.
 *
 * @since 0.1.0
 * @internal
 */

import { Either } from "effect"
import { ConvergenceError, InvalidBracketError, type RootFindingError } from "../Errors.js"
import { DEFAULT_MAX_ITERATIONS, DEFAULT_TOLERANCE } from "../Options.js"
import type { ScalarFunction } from "../Types.js"

/**
 * Newton-Raphson iteration: `x <- x - f(x) / df(x)` while `|f(x)| > tolerance`.
 *
 * The first convergence test uses `x0` itself, so an initial guess that is
 * already within tolerance is returned untouched. A zero derivative is not
 * trapped: the estimate becomes infinite or NaN, and a NaN residual ends the
 * loop with that NaN as the result.
 *
 * @param f - Function whose root is sought
 * @param df - Derivative of `f`
 * @param x0 - Initial estimate
 * @param tolerance - Convergence is reached once `|f(x)| <= tolerance`
 * @param maxIterations - Updates allowed before failing
 *
 * @example
 * ```typescript
 * newtonRaphsonEither((x) => x * x - 2, (x) => 2 * x, 1)
 * // Either.right(1.4142156862745099)
 * ```
 *
 * @since 0.1.0
 * @category Pure Functions
 */
export function newtonRaphsonEither(
  f: ScalarFunction,
  df: ScalarFunction,
  x0: number,
  tolerance: number = DEFAULT_TOLERANCE,
  maxIterations: number = DEFAULT_MAX_ITERATIONS,
): Either.Either<number, ConvergenceError> {
  let x = x0
  let fx = f(x)
  let iteration = 0

  while (Math.abs(fx) > tolerance) {
    x = x - fx / df(x)
    iteration += 1
    if (iteration > maxIterations) {
      return Either.left(
        new ConvergenceError({ method: "newton-raphson", iterations: iteration, estimate: x }),
      )
    }
    fx = f(x)
  }

  return Either.right(x)
}

/**
 * Bisection over `[x0, x1]`.
 *
 * The loop guard tests the midpoint computed on the previous pass, before it
 * is recomputed, so an exact root found at iteration `n` is only returned
 * once iteration `n` has been counted against the cap. Each pass evaluates
 * `f` afresh at the midpoint and both endpoints.
 *
 * Narrowing checks the four sign cases in a fixed order and the first match
 * wins. When none matches (an exact zero at the midpoint) neither endpoint
 * moves.
 *
 * @param f - Function whose root is sought
 * @param x0 - Left end of the initial bracket
 * @param x1 - Right end of the initial bracket
 * @param tolerance - Convergence is reached once `|f(mid)| <= tolerance`
 * @param maxIterations - Halvings allowed before failing
 *
 * @since 0.1.0
 * @category Pure Functions
 */
export function bisectionEither(
  f: ScalarFunction,
  x0: number,
  x1: number,
  tolerance: number = DEFAULT_TOLERANCE,
  maxIterations: number = DEFAULT_MAX_ITERATIONS,
): Either.Either<number, RootFindingError> {
  let left = x0
  let right = x1
  let iteration = 0
  let mid = (left + right) / 2

  while (Math.abs(f(mid)) > tolerance) {
    mid = (left + right) / 2
    const fMid = f(mid)
    const fLeft = f(left)
    const fRight = f(right)

    if (fLeft > 0 && fRight > 0) {
      return Either.left(
        new InvalidBracketError({ sign: "positive", left, right, leftValue: fLeft, rightValue: fRight }),
      )
    } else if (fLeft < 0 && fRight < 0) {
      return Either.left(
        new InvalidBracketError({ sign: "negative", left, right, leftValue: fLeft, rightValue: fRight }),
      )
    }

    if (fMid < 0 && fLeft < 0) {
      left = mid
    } else if (fMid > 0 && fLeft > 0) {
      left = mid
    } else if (fMid > 0 && fRight > 0) {
      right = mid
    } else if (fMid < 0 && fRight < 0) {
      right = mid
    }

    iteration += 1
    if (iteration > maxIterations) {
      return Either.left(
        new ConvergenceError({ method: "bisection", iterations: iteration, estimate: mid }),
      )
    }
  }

  return Either.right(mid)
}

/**
 * Newton-Raphson from `x0`, falling back to bisection over `[x0, x1]` when
 * Newton-Raphson runs out of iterations. Bisection's outcome is returned as
 * is.
 *
 * @since 0.1.0
 * @category Pure Functions
 */
export function solveEither(
  f: ScalarFunction,
  df: ScalarFunction,
  x0: number,
  x1: number,
  tolerance: number = DEFAULT_TOLERANCE,
  newtonMaxIterations: number = DEFAULT_MAX_ITERATIONS,
  bisectionMaxIterations: number = DEFAULT_MAX_ITERATIONS,
): Either.Either<number, RootFindingError> {
  return Either.orElse(
    newtonRaphsonEither(f, df, x0, tolerance, newtonMaxIterations),
    () => bisectionEither(f, x0, x1, tolerance, bisectionMaxIterations),
  )
}
