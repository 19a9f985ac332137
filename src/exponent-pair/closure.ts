/**
 * Closure of a set of exponent pairs under the registered transforms.
 *
 * @packageDocumentation
 */

import { convexHull } from '../geometry/index.js';
import type { Hypothesis } from '../knowledge/hypothesis.js';
import type { HypothesisSet } from '../knowledge/hypothesis-set.js';
import { KeyedMap } from '../utils/keyed-map.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { assertHypothesisSet, ContractViolationError } from './errors.js';
import { pairPoint } from './types.js';
import type { ExponentPair } from './types.js';

/**
 * Default number of transform rounds.
 */
export const DEFAULT_SEARCH_DEPTH = 5;

/**
 * Options for {@link computeExpPairs}.
 */
export interface ClosureOptions {
  /**
   * Number of rounds in which every transform is applied.
   * @defaultValue 5
   */
  searchDepth?: number | undefined;
  /**
   * Reduce the working set to its convex hull vertices after each round.
   *
   * This assumes an interior point can never become a hull vertex after further
   * transforms. It holds for the van der Corput transforms but is not
   * guaranteed for transforms registered in the future.
   * @defaultValue true
   */
  prune?: boolean | undefined;
  logger?: Logger | undefined;
}

type PairTable = KeyedMap<ExponentPair, Hypothesis<'Exponent pair'>>;

const pairKey = (pair: ExponentPair): string => pair.key();

function tableOf(pairs: Iterable<Hypothesis<'Exponent pair'>>): PairTable {
  return KeyedMap.fromValues(pairs, (h) => h.data, pairKey);
}

/**
 * Expands the exponent pairs of a hypothesis set by applying its transforms.
 *
 * Each round applies the transforms in set order. Every transform works on a
 * snapshot of the keys present when it starts, so a transform sees the pairs
 * produced earlier in the same round.
 *
 * @param hypotheses - Source of known pairs and registered transforms. Not modified.
 * @param options - Search depth, pruning and logger.
 * @returns The distinct-keyed pairs after all rounds, input pairs included
 * unless pruned away.
 * @throws ContractViolationError for a non-set argument or an invalid depth.
 *
 * @example
 * ```typescript
 * const set = new HypothesisSet([trivialExpPair, vanDerCorputA, vanDerCorputB]);
 * const pairs = computeExpPairs(set, { searchDepth: 2 });
 * ```
 */
export function computeExpPairs(
  hypotheses: HypothesisSet,
  options: ClosureOptions = {}
): Hypothesis<'Exponent pair'>[] {
  assertHypothesisSet(hypotheses, 'computeExpPairs');

  const searchDepth = options.searchDepth ?? DEFAULT_SEARCH_DEPTH;
  if (!Number.isInteger(searchDepth) || searchDepth < 0) {
    throw new ContractViolationError(
      'computeExpPairs',
      `searchDepth must be a non-negative integer, got ${String(searchDepth)}`
    );
  }
  const prune = options.prune ?? true;
  const logger = options.logger ?? silentLogger;

  const transforms = hypotheses.listHypotheses('Exponent pair transform');
  let pairs = tableOf(hypotheses.listHypotheses('Exponent pair'));

  for (let round = 1; round <= searchDepth; round++) {
    for (const transform of transforms) {
      for (const key of pairs.keys()) {
        const source = pairs.get(key);
        if (source === undefined) {
          continue;
        }
        const image = transform.data.transform(source);
        pairs.setIfAbsent(image.data, image);
      }
    }

    const generated = pairs.size;
    if (prune && pairs.size >= 3) {
      pairs = tableOf(convexHull(pairs.values(), pairPoint));
    }

    logger.debug('closure_round_complete', {
      round,
      generated,
      retained: pairs.size,
    });
  }

  return pairs.values();
}
