/**
 * Proof search: deciding whether (k, l) follows from known results by convexity.
 *
 * The set of exponent pairs is convex, so a target inside the convex hull of
 * known pairs is an exponent pair. The proof cites hull vertices spanning it.
 *
 * @packageDocumentation
 */

import { createNumericContext, Rational } from '../numeric/index.js';
import type { NumericContext, RationalLike } from '../numeric/index.js';
import { Polytope } from '../geometry/index.js';
import type { Hypothesis } from '../knowledge/hypothesis.js';
import type { HypothesisSet } from '../knowledge/hypothesis-set.js';
import { isAvailableBy } from '../knowledge/reference.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { betaBoundsToExponentPairs } from './beta-duality.js';
import { computeExpPairs } from './closure.js';
import type { ClosureOptions } from './closure.js';
import { derivedExpPair } from './constructors.js';
import { assertHypothesisSet, UnimplementedMethodError } from './errors.js';
import { computeConvexHull } from './hull-cache.js';
import { ExponentPair, isProofOptimizationMethod, pairPoint } from './types.js';
import type { ProofOptimizationMethod } from './types.js';

/**
 * Options shared by the proof search entry points.
 */
export interface ProofSearchOptions extends ClosureOptions {
  /**
   * Precision used when a target coordinate is a non-integer number.
   * @defaultValue a context with the default precision
   */
  context?: NumericContext | undefined;
}

/**
 * Options for {@link findProof}.
 */
export interface FindProofOptions extends ProofSearchOptions {
  /**
   * Cite only the cheapest containing triangle of hull vertices instead of
   * every hull vertex.
   * @defaultValue true
   */
  optimize?: boolean | undefined;
}

/**
 * Result of {@link findBestProof}.
 */
export type ProofOutcome =
  | { readonly status: 'proved'; readonly proof: Hypothesis<'Exponent pair'> }
  | { readonly status: 'no_result' }
  | { readonly status: 'not_supported'; readonly method: ProofOptimizationMethod };

const NO_RESULT: ProofOutcome = Object.freeze({ status: 'no_result' });

function toOutcome(proof: Hypothesis<'Exponent pair'> | undefined): ProofOutcome {
  return proof === undefined ? NO_RESULT : { status: 'proved', proof };
}

/**
 * Copies the set and adds the pairs derivable from its beta bounds and
 * transforms. The caller's set is untouched.
 */
function augment(hypotheses: HypothesisSet, options: ProofSearchOptions): HypothesisSet {
  const working = hypotheses.copy();
  working.addHypotheses(betaBoundsToExponentPairs(working, { logger: options.logger }));
  working.addHypotheses(computeExpPairs(working, options));
  return working;
}

/**
 * Among all triangles of hull vertices containing the target, returns the one
 * with the smallest total proof complexity. Triangles are enumerated as index
 * combinations in lexicographic order and the first minimum is kept.
 */
function cheapestTriangle(
  target: ExponentPair,
  vertices: readonly Hypothesis<'Exponent pair'>[]
): Hypothesis<'Exponent pair'>[] | undefined {
  const point = target.toPoint();
  let best: Hypothesis<'Exponent pair'>[] | undefined;
  let lowest = Number.POSITIVE_INFINITY;

  for (let i = 0; i < vertices.length; i++) {
    for (let j = i + 1; j < vertices.length; j++) {
      for (let k = j + 1; k < vertices.length; k++) {
        const a = vertices[i];
        const b = vertices[j];
        const c = vertices[k];
        if (a === undefined || b === undefined || c === undefined) {
          continue;
        }
        const triangle = [a, b, c];
        if (!Polytope.fromVertices(triangle.map(pairPoint)).contains(point)) {
          continue;
        }
        const complexity = triangle.reduce((sum, v) => sum + v.proofComplexity(), 0);
        if (complexity < lowest) {
          lowest = complexity;
          best = triangle;
        }
      }
    }
  }

  return best;
}

/**
 * Tries to prove that (k, l) is an exponent pair from a set of hypotheses.
 *
 * The set is augmented, on a copy, with the pairs from its beta bounds and the
 * closure under its transforms. If (k, l) lies in the convex hull of all known
 * pairs (boundary included) a derived hypothesis is returned, citing either
 * the cheapest containing triangle of hull vertices (`optimize`) or all hull
 * vertices. When fewer than three hull vertices exist, all are cited.
 *
 * @param k - First coordinate of the target.
 * @param l - Second coordinate of the target.
 * @param hypotheses - Known results. Not modified.
 * @param options - Optimization, closure settings, numeric context and logger.
 * @returns The proof, or undefined if none can be found.
 * @throws ContractViolationError for a non-set argument.
 *
 * @example
 * ```typescript
 * const set = new HypothesisSet([trivialExpPair, vanDerCorputA, vanDerCorputB]);
 * const proof = findProof('1/6', '2/3', set);
 * proof?.proof; // "Follows from convexity and the exponent pairs ..."
 * ```
 */
export function findProof(
  k: RationalLike,
  l: RationalLike,
  hypotheses: HypothesisSet,
  options: FindProofOptions = {}
): Hypothesis<'Exponent pair'> | undefined {
  assertHypothesisSet(hypotheses, 'findProof');
  const logger = options.logger ?? silentLogger;
  const context = options.context ?? createNumericContext();
  const target = new ExponentPair(Rational.coerce(k, context), Rational.coerce(l, context));

  const working = augment(hypotheses, options);
  if (working.listHypotheses('Exponent pair').length === 0) {
    logger.debug('proof_not_found', { target: target.toString(), reason: 'no_exponent_pairs' });
    return undefined;
  }

  const vertices = computeConvexHull(working, { logger });
  const region = Polytope.fromVertices(vertices.map(pairPoint));
  if (!region.contains(target.toPoint())) {
    logger.debug('proof_not_found', { target: target.toString(), reason: 'outside_hull' });
    return undefined;
  }

  const optimize = options.optimize ?? true;
  const cited = (optimize ? cheapestTriangle(target, vertices) : undefined) ?? [...vertices];
  const proof =
    'Follows from convexity and the exponent pairs ' +
    cited.map((v) => v.data.toString()).join(', ');

  logger.debug('proof_found', { target: target.toString(), citations: cited.length });
  return derivedExpPair(target.k, target.l, proof, cited);
}

/**
 * Finds the earliest proof: tries each year from the earliest to the latest
 * publication year in the set, using only results available by then. Undated
 * results are always available.
 */
function findEarliestProof(
  k: RationalLike,
  l: RationalLike,
  hypotheses: HypothesisSet,
  options: ProofSearchOptions
): ProofOutcome {
  const years: number[] = [];
  for (const hypothesis of hypotheses) {
    const year = hypothesis.reference.year();
    if (year.kind === 'known') {
      years.push(year.value);
    }
  }

  if (years.length === 0) {
    return toOutcome(findProof(k, l, hypotheses, { ...options, optimize: true }));
  }

  const fromYear = Math.min(...years);
  const toYear = Math.max(...years);
  let previousSize = 0;

  for (let year = fromYear; year <= toYear; year++) {
    const available = hypotheses.filter((h) => isAvailableBy(h.reference.year(), year));
    if (available.size === previousSize) {
      continue;
    }
    previousSize = available.size;

    const proof = findProof(k, l, available, { ...options, optimize: true });
    if (proof !== undefined) {
      return { status: 'proved', proof };
    }
  }

  return NO_RESULT;
}

/**
 * Proves (k, l) using a proof optimization method.
 *
 * - `date`: the historically earliest proof
 * - `complexity`: {@link findProof} with triangle optimization on the full set
 * - `none`: augments the set and computes its hull, then reports
 *   `not_supported`; this method has no defined proof output
 *
 * @param k - First coordinate of the target.
 * @param l - Second coordinate of the target.
 * @param hypotheses - Known results. Not modified.
 * @param method - Optimization method: 'date', 'complexity' or 'none'.
 * @param options - Closure settings, numeric context and logger.
 * @throws ContractViolationError for a non-set argument.
 * @throws UnimplementedMethodError for an unrecognized method.
 */
export function findBestProof(
  k: RationalLike,
  l: RationalLike,
  hypotheses: HypothesisSet,
  method: string = 'date',
  options: ProofSearchOptions = {}
): ProofOutcome {
  assertHypothesisSet(hypotheses, 'findBestProof');
  const logger = options.logger ?? silentLogger;
  if (!isProofOptimizationMethod(method)) {
    throw new UnimplementedMethodError(method);
  }

  switch (method) {
    case 'date':
      return findEarliestProof(k, l, hypotheses, options);
    case 'complexity':
      return toOutcome(findProof(k, l, hypotheses, { ...options, optimize: true }));
    case 'none': {
      computeConvexHull(augment(hypotheses, options), { logger });
      logger.warn('method_not_supported', { method });
      return { status: 'not_supported', method };
    }
    default: {
      const unrecognized: never = method;
      throw new UnimplementedMethodError(String(unrecognized));
    }
  }
}
