/**
 * @since 0.1.0
 */
export * from "./Errors.js"
export * from "./Types.js"
export * from "./Options.js"
export * from "./RootFinding.js"
export * from "./RootFinder.js"
export { bisectionEither, newtonRaphsonEither, solveEither } from "./internal/pure.js"
