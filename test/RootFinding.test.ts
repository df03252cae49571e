import { describe, it, expect } from "@effect/vitest"
import { Effect, Logger, LogLevel } from "effect"
import { bisection, newtonRaphson, solve } from "../src/RootFinding.js"
import {
  makeCyclingCubic,
  makeLinear,
  makeNoRealRoot,
  makeSquareRootOfTwo,
  recordCalls,
} from "./fixtures.js"

describe("newtonRaphson", () => {
  it.effect("converges to sqrt(2) with default options", () =>
    Effect.gen(function* () {
      const { f, df } = makeSquareRootOfTwo()

      const root = yield* newtonRaphson(f, df, 1)

      expect(root).toBe(1.4142156862745099)
    }),
  )

  it.effect("honours an explicit tolerance", () =>
    Effect.gen(function* () {
      const { f, df } = makeSquareRootOfTwo()

      const root = yield* newtonRaphson(f, df, 1, { tolerance: 1e-12 })

      expect(root).toBe(Math.SQRT2)
    }),
  )

  it.effect("fails with ConvergenceError when the cap is exceeded", () =>
    Effect.gen(function* () {
      const { f, df } = makeCyclingCubic()

      const error = yield* Effect.flip(newtonRaphson(f, df, 0))

      expect(error._tag).toBe("ConvergenceError")
      expect(error).toMatchObject({ method: "newton-raphson", iterations: 21, estimate: 1 })
    }),
  )

  it.effect("rejects a non-positive tolerance before evaluating f", () =>
    Effect.gen(function* () {
      const f = recordCalls(makeLinear(3).f)

      const error = yield* Effect.flip(newtonRaphson(f.fn, () => 1, 0, { tolerance: 0 }))

      expect(error._tag).toBe("InvalidSolverOptionsError")
      expect(error).toMatchObject({ option: "tolerance", value: 0, expected: "a positive number" })
      expect(f.calls).toEqual([])
    }),
  )

  it.effect("rejects a fractional iteration cap", () =>
    Effect.gen(function* () {
      const { f, df } = makeSquareRootOfTwo()

      const error = yield* Effect.flip(newtonRaphson(f, df, 1, { maxIterations: 2.5 }))

      expect(error.message).toBe("Invalid maxIterations 2.5: expected a non-negative integer")
    }),
  )

  it("gives bit-identical results on repeated calls", () => {
    const { f, df } = makeSquareRootOfTwo()

    const first = Effect.runSync(newtonRaphson(f, df, 7.25))
    const second = Effect.runSync(newtonRaphson(f, df, 7.25))

    expect(Object.is(first, second)).toBe(true)
  })
})

describe("bisection", () => {
  it.effect("converges to sqrt(2) on [0, 2]", () =>
    Effect.gen(function* () {
      const { f } = makeSquareRootOfTwo()

      const root = yield* bisection(f, 0, 2)

      expect(root).toBe(1.414215087890625)
      expect(Math.abs(root - Math.SQRT2)).toBeLessThan(1e-5)
    }),
  )

  it.effect("fails with InvalidBracketError when f has no sign change", () =>
    Effect.gen(function* () {
      const { f } = makeNoRealRoot()

      const error = yield* Effect.flip(bisection(f, -3, 5))

      expect(error._tag).toBe("InvalidBracketError")
      expect(error.message).toBe("f(x) positive for both endpoints.")
    }),
  )

  it.effect("fails with ConvergenceError when the cap is exceeded", () =>
    Effect.gen(function* () {
      const { f } = makeSquareRootOfTwo()

      const error = yield* Effect.flip(bisection(f, 0, 2, { maxIterations: 3 }))

      expect(error).toMatchObject({ method: "bisection", iterations: 4, estimate: 1.375 })
    }),
  )

  it.effect("rejects a negative iteration cap", () =>
    Effect.gen(function* () {
      const { f } = makeSquareRootOfTwo()

      const error = yield* Effect.flip(bisection(f, 0, 2, { maxIterations: -1 }))

      expect(error).toMatchObject({ option: "maxIterations", value: -1 })
    }),
  )
})

describe("solve", () => {
  it.effect("returns the Newton-Raphson root when it converges", () =>
    Effect.gen(function* () {
      const { f, df } = makeLinear(3)

      const root = yield* solve(f, df, 0, 1)

      expect(root).toBe(3)
    }),
  )

  it.effect("falls back to bisection when Newton-Raphson is not allowed to iterate", () =>
    Effect.gen(function* () {
      const { f, df } = makeSquareRootOfTwo()

      const root = yield* solve(f, df, 1, 2, { newtonMaxIterations: 0 })

      expect(root).toBe(1.414215087890625)
    }),
  )

  it.effect("propagates InvalidBracketError from the fallback", () =>
    Effect.gen(function* () {
      const { f, df } = makeCyclingCubic()

      const error = yield* Effect.flip(solve(f, df, 0, 1))

      expect(error._tag).toBe("InvalidBracketError")
      expect(error).toMatchObject({ sign: "positive", leftValue: 2, rightValue: 1 })
    }),
  )

  it.effect("propagates the fallback's own ConvergenceError", () =>
    Effect.gen(function* () {
      const { f, df } = makeSquareRootOfTwo()

      const error = yield* Effect.flip(
        solve(f, df, 0, 2, { newtonMaxIterations: 0, bisectionMaxIterations: 3 }),
      )

      expect(error).toMatchObject({ method: "bisection", iterations: 4, estimate: 1.375 })
    }),
  )

  it.effect("validates every option", () =>
    Effect.gen(function* () {
      const { f, df } = makeSquareRootOfTwo()

      const error = yield* Effect.flip(solve(f, df, 1, 2, { bisectionMaxIterations: -2 }))

      expect(error).toMatchObject({ option: "bisectionMaxIterations", value: -2 })
    }),
  )

  it.effect("logs the fallback at debug level", () =>
    Effect.gen(function* () {
      const { f, df } = makeSquareRootOfTwo()
      const messages: Array<string> = []
      const logger = Logger.make(({ message }) => {
        messages.push(String(message))
      })

      yield* solve(f, df, 1, 2, { newtonMaxIterations: 0 }).pipe(
        Effect.provide(Logger.replace(Logger.defaultLogger, logger)),
        Logger.withMinimumLogLevel(LogLevel.Debug),
      )

      expect(messages).toEqual([
        "Newton-Raphson gave up after 1 iterations; falling back to bisection on [1, 2]",
        "Bisection converged to 1.414215087890625",
      ])
    }),
  )

  it("gives bit-identical results on repeated calls", () => {
    const { f, df } = makeSquareRootOfTwo()

    const first = Effect.runSync(solve(f, df, 1, 2, { newtonMaxIterations: 1 }))
    const second = Effect.runSync(solve(f, df, 1, 2, { newtonMaxIterations: 1 }))

    expect(Object.is(first, second)).toBe(true)
  })
})
