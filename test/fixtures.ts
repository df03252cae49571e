import { Either } from "effect"
import type { ScalarFunction } from "../src/Types.js"

export interface ScalarProblem {
  readonly f: ScalarFunction
  readonly df: ScalarFunction
}

/**
 * x^2 - 2, root at sqrt(2).
 */
export const makeSquareRootOfTwo = (): ScalarProblem => ({
  f: (x) => x * x - 2,
  df: (x) => 2 * x,
})

/**
 * x^3 - 2x + 2: Newton-Raphson from 0 cycles 0, 1, 0, 1, ...
 */
export const makeCyclingCubic = (): ScalarProblem => ({
  f: (x) => x * x * x - 2 * x + 2,
  df: (x) => 3 * x * x - 2,
})

/**
 * x^2 + 1, positive everywhere.
 */
export const makeNoRealRoot = (): ScalarProblem => ({
  f: (x) => x * x + 1,
  df: (x) => 2 * x,
})

/**
 * x - root, with unit slope.
 */
export const makeLinear = (root: number): ScalarProblem => ({
  f: (x) => x - root,
  df: () => 1,
})

/**
 * Wrap a function so every argument it is called with is recorded.
 */
export const recordCalls = (fn: ScalarFunction) => {
  const calls: Array<number> = []
  const recorded: ScalarFunction = (x) => {
    calls.push(x)
    return fn(x)
  }
  return { fn: recorded, calls }
}

export const leftOf = <A, E>(result: Either.Either<A, E>): E => {
  if (Either.isRight(result)) {
    throw new Error(`expected a failure, got ${String(result.right)}`)
  }
  return result.left
}
