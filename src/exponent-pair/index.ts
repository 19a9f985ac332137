/**
 * Exponent pairs: records, van der Corput transforms, closure, hull cache,
 * beta-bound duality and proof search.
 *
 * @packageDocumentation
 */

export {
  ExponentPair,
  ExponentPairTransform,
  isProofOptimizationMethod,
  pairPoint,
  PROOF_OPTIMIZATION_METHODS,
} from './types.js';
export type { ProofOptimizationMethod, TransformFunction } from './types.js';
export { ContractViolationError, UnimplementedMethodError } from './errors.js';
export {
  derivedExpPair,
  exponentPairConjecture,
  literatureExpPair,
  trivialExpPair,
} from './constructors.js';
export {
  B_TRANSFORM_KEYWORD,
  defineTransform,
  vanDerCorputA,
  vanDerCorputAMap,
  vanDerCorputB,
  vanDerCorputBMap,
} from './transforms.js';
export type { TransformDefinition } from './transforms.js';
export { computeExpPairs, DEFAULT_SEARCH_DEPTH } from './closure.js';
export type { ClosureOptions } from './closure.js';
export { computeConvexHull } from './hull-cache.js';
export { betaBoundsToExponentPairs, dualExponentPair, tangentLine } from './beta-duality.js';
export type { TangentLine } from './beta-duality.js';
export { findBestProof, findProof } from './proof-search.js';
export type { FindProofOptions, ProofOutcome, ProofSearchOptions } from './proof-search.js';
export { createProver, ExponentPairProver } from './prover.js';
export type { ProverOptions } from './prover.js';
