/**
 * Knowledge base: references, hypotheses and hypothesis sets.
 *
 * @packageDocumentation
 */

export {
  formatYear,
  isAvailableBy,
  knownYear,
  Reference,
  UNKNOWN_YEAR,
} from './reference.js';
export type { PublicationYear, ReferenceKind } from './reference.js';
export { Hypothesis } from './hypothesis.js';
export type { HypothesisInit, HypothesisPayloads, HypothesisType } from './hypothesis.js';
export { HypothesisSet } from './hypothesis-set.js';
export type { DerivedDataCache } from './hypothesis-set.js';
