/**
 * Cached convex hull of the exponent pairs in a hypothesis set.
 *
 * @packageDocumentation
 */

import { convexHull } from '../geometry/index.js';
import type { Hypothesis } from '../knowledge/hypothesis.js';
import type { HypothesisSet } from '../knowledge/hypothesis-set.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { assertHypothesisSet } from './errors.js';
import { pairPoint } from './types.js';

/**
 * Returns the exponent-pair hypotheses on the convex hull of the set's pairs.
 *
 * The result is stored in the set's cache and returned unchanged by later calls
 * until an insertion invalidates it. With fewer than three pairs no hull is
 * computed and all pairs are returned.
 *
 * @param hypotheses - The set; its cache is updated.
 * @param options - Optional logger.
 * @returns Hull vertex hypotheses, counter-clockwise.
 * @throws ContractViolationError for a non-set argument.
 */
export function computeConvexHull(
  hypotheses: HypothesisSet,
  options: { logger?: Logger | undefined } = {}
): readonly Hypothesis<'Exponent pair'>[] {
  assertHypothesisSet(hypotheses, 'computeConvexHull');
  const logger = options.logger ?? silentLogger;

  const cached = hypotheses.cache;
  if (cached.valid && cached.convexHull !== undefined) {
    logger.debug('hull_cache_hit', { vertexCount: cached.convexHull.length });
    return cached.convexHull;
  }

  const pairs = hypotheses.listHypotheses('Exponent pair');
  const hull = pairs.length < 3 ? pairs : convexHull(pairs, pairPoint);
  hypotheses.storeConvexHull(hull);

  logger.debug('hull_computed', { pairCount: pairs.length, vertexCount: hull.length });
  return hull;
}
