/**
 * Type Foundations & Branded Scalars
 *
 * Tolerances and iteration caps are branded numbers so a validated value
 * cannot be confused with an arbitrary one.
 *
 * @since 0.1.0
 */

import { Schema } from "effect"

/**
 * A scalar function of one real variable. Solvers assume it is pure.
 *
 * @since 0.1.0
 */
export type ScalarFunction = (x: number) => number

/**
 * Convergence threshold on `|f(x)|`: a number strictly greater than zero.
 *
 * @since 0.1.0
 * @category Scalars
 */
export const Tolerance = Schema.Number.pipe(Schema.positive(), Schema.brand("Tolerance"))

/**
 * Type extracted from Tolerance schema
 *
 * @since 0.1.0
 * @category Scalars
 */
export type Tolerance = typeof Tolerance.Type

/**
 * Maximum number of refinement steps: a non-negative integer. A cap of zero
 * fails on the first update.
 *
 * @since 0.1.0
 * @category Scalars
 */
export const IterationCap = Schema.Int.pipe(Schema.nonNegative(), Schema.brand("IterationCap"))

/**
 * Type extracted from IterationCap schema
 *
 * @since 0.1.0
 * @category Scalars
 */
export type IterationCap = typeof IterationCap.Type
