/**
 * Exact numeric types.
 *
 * @packageDocumentation
 */

export { Rational, RationalArithmeticError } from './rational.js';
export type { RationalLike } from './rational.js';
export { createNumericContext, DEFAULT_PRECISION } from './context.js';
export type { NumericContext } from './context.js';
