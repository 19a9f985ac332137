import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { convexHull } from '../geometry/index.js';
import { HypothesisSet } from '../knowledge/hypothesis-set.js';
import { Reference } from '../knowledge/reference.js';
import { Logger } from '../utils/logger.js';
import {
  computeExpPairs,
  ContractViolationError,
  defineTransform,
  ExponentPair,
  literatureExpPair,
  pairPoint,
  trivialExpPair,
  vanDerCorputA,
  vanDerCorputB,
} from './index.js';
import type { Hypothesis } from '../knowledge/hypothesis.js';

const keys = (pairs: readonly Hypothesis<'Exponent pair'>[]): string[] =>
  pairs.map((h) => h.data.toString());

const classical = (): HypothesisSet =>
  new HypothesisSet([trivialExpPair, vanDerCorputA, vanDerCorputB]);

describe('computeExpPairs', () => {
  it('should return the input pairs at depth 0', () => {
    expect(computeExpPairs(classical(), { searchDepth: 0 })).toEqual([trivialExpPair]);
  });

  it('should add the B image of (0, 1) in the first round', () => {
    expect(keys(computeExpPairs(classical(), { searchDepth: 1, prune: false }))).toEqual([
      '(0, 1)',
      '(1/2, 1/2)',
    ]);
  });

  it('should reach (1/6, 2/3) in the second round', () => {
    expect(keys(computeExpPairs(classical(), { searchDepth: 2, prune: false }))).toEqual([
      '(0, 1)',
      '(1/2, 1/2)',
      '(1/6, 2/3)',
    ]);
  });

  it('should keep pruned results in hull order', () => {
    expect(keys(computeExpPairs(classical(), { searchDepth: 2 }))).toEqual([
      '(0, 1)',
      '(1/6, 2/3)',
      '(1/2, 1/2)',
    ]);
  });

  it('should let a later transform see pairs made earlier in the same round', () => {
    const ref = Reference.literature('Alpha', 1990);
    const shiftK = defineTransform({
      name: 'Shift k',
      label: 'K',
      reference: ref,
      map: (pair) => new ExponentPair(pair.k.add(1), pair.l),
    });
    const shiftL = defineTransform({
      name: 'Shift l',
      label: 'L',
      reference: ref,
      map: (pair) => new ExponentPair(pair.k, pair.l.add(1)),
    });
    const set = new HypothesisSet([literatureExpPair(0, 0, ref), shiftK, shiftL]);

    expect(keys(computeExpPairs(set, { searchDepth: 1, prune: false }))).toEqual([
      '(0, 0)',
      '(1, 0)',
      '(0, 1)',
      '(1, 1)',
    ]);
  });

  it('should produce the same hull with and without pruning', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 4 }), (depth) => {
        const hullKeys = (prune: boolean): string[] =>
          keys(convexHull(computeExpPairs(classical(), { searchDepth: depth, prune }), pairPoint))
            .slice()
            .sort();
        expect(hullKeys(true)).toEqual(hullKeys(false));
      }),
      { numRuns: 5 }
    );
  });

  it('should not modify the input set', () => {
    const set = classical();
    computeExpPairs(set, { searchDepth: 3 });
    expect(set.size).toBe(3);
  });

  it('should return no pairs for a set without pairs', () => {
    expect(computeExpPairs(new HypothesisSet([vanDerCorputA]), { searchDepth: 3 })).toEqual([]);
  });

  it('should reject a negative or fractional depth', () => {
    expect(() => computeExpPairs(classical(), { searchDepth: -1 })).toThrow(
      ContractViolationError
    );
    expect(() => computeExpPairs(classical(), { searchDepth: 1.5 })).toThrow(
      'computeExpPairs: searchDepth must be a non-negative integer, got 1.5'
    );
  });

  it('should reject an argument that is not a hypothesis set', () => {
    expect(() => Reflect.apply(computeExpPairs, undefined, [[trivialExpPair]])).toThrow(
      'computeExpPairs: expected a HypothesisSet, got object'
    );
  });

  it('should log each round at debug level', () => {
    const lines: string[] = [];
    const logger = new Logger({
      component: 'Closure',
      debugMode: true,
      sink: (line) => lines.push(line),
    });

    computeExpPairs(classical(), { searchDepth: 1, prune: false, logger });

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? '');
    expect(entry).toMatchObject({
      level: 'debug',
      component: 'Closure',
      event: 'closure_round_complete',
      data: { round: 1, generated: 2, retained: 2 },
    });
  });
});
