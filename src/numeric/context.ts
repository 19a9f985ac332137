/**
 * Numeric precision configuration.
 *
 * A context is created once from configuration and then passed, read-only, to
 * every component that turns floating-point values into rationals. It is frozen
 * so a running computation cannot change it.
 *
 * @packageDocumentation
 */

import { RationalArithmeticError } from './rational.js';

/**
 * Read-only precision settings for float-to-rational conversion.
 */
export interface NumericContext {
  /** Number of significant decimal places retained. */
  readonly precision: number;
  /** Largest denominator a rationalized float may have (10^precision). */
  readonly maxDenominator: bigint;
}

/**
 * Default number of decimal places.
 *
 * Lower than the 1000 places an arbitrary-precision float backend would keep.
 * Exact arithmetic never rounds, so precision only bounds the denominators of
 * rationalized doubles, and a double carries about 17 significant digits. Set
 * `numeric.precision` up to 1000 for the wider bound.
 */
export const DEFAULT_PRECISION = 30;

/**
 * Creates a frozen numeric context.
 *
 * @param precision - Positive number of decimal places.
 * @returns The context.
 * @throws RationalArithmeticError if precision is not a positive integer.
 */
export function createNumericContext(precision: number = DEFAULT_PRECISION): NumericContext {
  if (!Number.isInteger(precision) || precision < 1) {
    throw new RationalArithmeticError(
      `Precision must be a positive integer, got ${String(precision)}`
    );
  }
  return Object.freeze({
    precision,
    maxDenominator: 10n ** BigInt(precision),
  });
}
