/**
 * Piecewise bounds on beta.
 *
 * @packageDocumentation
 */

export {
  AffinePiece,
  betaBoundHypothesis,
  InvalidIntervalError,
  Interval,
  OutOfDomainError,
  SampledPiece,
} from './bound.js';
export type { BetaBoundPiece } from './bound.js';
