import { describe, expect, it } from 'vitest';
import { AffinePiece, betaBoundHypothesis, Interval } from '../beta/index.js';
import { HypothesisSet } from '../knowledge/hypothesis-set.js';
import { Reference } from '../knowledge/reference.js';
import { Rational } from '../numeric/index.js';
import {
  betaBoundsToExponentPairs,
  dualExponentPair,
  literatureExpPair,
  tangentLine,
  trivialExpPair,
  vanDerCorputA,
  vanDerCorputB,
} from './index.js';

const ref = Reference.literature('Alpha', 1990);

const bound = (
  slope: string | number,
  intercept: string | number,
  x0: string | number,
  x1: string | number
) => betaBoundHypothesis(new AffinePiece(slope, intercept, new Interval(x0, x1)), ref);

const fullBound = bound('1/3', '1/6', 0, '1/2');

describe('tangentLine', () => {
  it('should pass through both points', () => {
    const line = tangentLine(
      { x: Rational.ZERO, y: Rational.of(1, 6) },
      { x: Rational.HALF, y: Rational.of(1, 3) }
    );

    expect(line.slope.toString()).toBe('1/3');
    expect(line.intercept.toString()).toBe('1/6');
    expect(dualExponentPair(line).toString()).toBe('(1/6, 1/2)');
  });
});

describe('betaBoundsToExponentPairs', () => {
  it('should turn a single linear bound into its dual pair', () => {
    const pairs = betaBoundsToExponentPairs(new HypothesisSet([fullBound]));

    expect(pairs).toHaveLength(1);
    const [pair] = pairs;
    expect(pair?.data.toString()).toBe('(1/6, 1/2)');
    expect(pair?.proof).toBe('Follows from combining 1 bounds on \\beta');
    expect([...(pair?.dependencies ?? [])]).toEqual([fullBound]);
    expect(pair?.reference.toString()).toBe('[Derived, 1990]');
  });

  it('should add B images when the B transform is registered', () => {
    const pairs = betaBoundsToExponentPairs(
      new HypothesisSet([fullBound, vanDerCorputA, vanDerCorputB])
    );

    expect(pairs.map((h) => h.data.toString())).toEqual(['(1/6, 1/2)', '(0, 2/3)']);
    const mirror = pairs[1];
    expect(mirror?.proof).toBe('Follows from applying the B transform to (1/6, 1/2)');
    expect(mirror?.dependencies.has(vanDerCorputB)).toBe(true);
  });

  it('should combine several pieces and cite those touching hull vertices', () => {
    const left = bound(0, '1/4', 0, '1/4');
    const right = bound('1/3', '1/6', '1/4', '1/2');

    const pairs = betaBoundsToExponentPairs(new HypothesisSet([right, left]));

    expect(pairs.map((h) => h.data.toString())).toEqual(['(1/4, 5/12)']);
    expect(pairs[0]?.proof).toBe('Follows from combining 2 bounds on \\beta');
    expect([...(pairs[0]?.dependencies ?? [])]).toEqual([left, right]);
  });

  it('should return known pairs first and reuse a known dual pair', () => {
    const known = literatureExpPair('1/6', '1/2', ref);

    const pairs = betaBoundsToExponentPairs(
      new HypothesisSet([trivialExpPair, known, fullBound])
    );

    expect(pairs).toEqual([trivialExpPair, known]);
    expect(pairs[1]).toBe(known);
  });

  it('should keep the dual pair when a local bound overlaps a covering one', () => {
    const local = bound(0, '1/5', '1/8', '1/4');

    const pairs = betaBoundsToExponentPairs(new HypothesisSet([fullBound, local]));

    expect(pairs.map((h) => h.data.toString())).toEqual(['(1/6, 1/2)']);
    expect([...(pairs[0]?.dependencies ?? [])]).toEqual([fullBound]);
  });

  it('should return nothing when the bounds do not cover [0, 1/2]', () => {
    const partial = bound('1/3', '1/6', 0, '1/4');

    expect(betaBoundsToExponentPairs(new HypothesisSet([partial, trivialExpPair]))).toEqual([]);
  });

  it('should return nothing without bounds', () => {
    expect(betaBoundsToExponentPairs(new HypothesisSet([trivialExpPair]))).toEqual([]);
  });

  it('should not modify the input set', () => {
    const set = new HypothesisSet([fullBound, vanDerCorputB]);
    betaBoundsToExponentPairs(set);
    expect(set.size).toBe(2);
  });
});
