import { Console, Effect } from "effect"
import { RootFinder } from "../src/RootFinder.js"
import { solve } from "../src/RootFinding.js"

const f = (x: number) => x * x - 2
const df = (x: number) => 2 * x

const program = Effect.gen(function* () {
  const newton = yield* solve(f, df, 1, 2)
  yield* Console.log(`sqrt(2) by Newton-Raphson: ${newton}`)

  const bisected = yield* solve(f, df, 1, 2, { newtonMaxIterations: 0 })
  yield* Console.log(`sqrt(2) by bisection fallback: ${bisected}`)

  const finder = yield* RootFinder
  const precise = yield* finder.solve(f, df, 1, 2)
  yield* Console.log(`sqrt(2) at tolerance ${finder.options.tolerance}: ${precise}`)
}).pipe(Effect.provide(RootFinder.layer({ tolerance: 1e-12 })))

Effect.runSync(program)
