import { describe, expect, it } from 'vitest';
import { HypothesisSet } from '../knowledge/hypothesis-set.js';
import { Reference } from '../knowledge/reference.js';
import { Logger } from '../utils/logger.js';
import { computeConvexHull, literatureExpPair, trivialExpPair, vanDerCorputB } from './index.js';

const ref = Reference.literature('Alpha', 1950);
const half = literatureExpPair('1/2', '1/2', ref);
const sixth = literatureExpPair('1/6', '2/3', ref);

const render = (pairs: readonly { data: { toString(): string } }[]): string[] =>
  pairs.map((h) => h.data.toString());

describe('computeConvexHull', () => {
  it('should return hull vertices counter-clockwise', () => {
    const set = new HypothesisSet([half, trivialExpPair, sixth]);

    expect(render(computeConvexHull(set))).toEqual(['(0, 1)', '(1/6, 2/3)', '(1/2, 1/2)']);
    expect(set.cache.valid).toBe(true);
  });

  it('should return the cached hull until the set changes', () => {
    const set = new HypothesisSet([trivialExpPair, half, sixth]);
    const first = computeConvexHull(set);

    expect(computeConvexHull(set)).toBe(first);

    set.addHypothesis(literatureExpPair(0, '1/2', ref));
    const second = computeConvexHull(set);

    expect(second).not.toBe(first);
    expect(render(second)).toEqual(['(0, 1/2)', '(1/2, 1/2)', '(0, 1)']);
  });

  it('should return all pairs when there are fewer than three', () => {
    const set = new HypothesisSet([trivialExpPair, vanDerCorputB, half]);

    expect(computeConvexHull(set)).toEqual([trivialExpPair, half]);
    expect(set.cache.valid).toBe(true);
  });

  it('should return nothing for a set without pairs', () => {
    expect(computeConvexHull(new HypothesisSet([vanDerCorputB]))).toEqual([]);
  });

  it('should log cache hits', () => {
    const events: unknown[] = [];
    const logger = new Logger({
      component: 'HullCache',
      debugMode: true,
      sink: (line) => {
        const entry: unknown = JSON.parse(line);
        events.push(entry);
      },
    });
    const set = new HypothesisSet([trivialExpPair, half, sixth]);

    computeConvexHull(set, { logger });
    computeConvexHull(set, { logger });

    expect(events).toMatchObject([
      { event: 'hull_computed', data: { pairCount: 3, vertexCount: 3 } },
      { event: 'hull_cache_hit', data: { vertexCount: 3 } },
    ]);
  });
});
