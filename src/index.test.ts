import { describe, it, expect } from 'vitest';
import {
  AffinePiece,
  betaBoundHypothesis,
  createProver,
  HypothesisSet,
  Interval,
  literatureExpPair,
  Reference,
  trivialExpPair,
  vanDerCorputA,
  vanDerCorputB,
  VERSION,
} from './index.js';

describe('Exponent Pair Prover', () => {
  describe('VERSION', () => {
    it('should follow semver format', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });

    it('should match package version', () => {
      expect(VERSION).toBe('0.1.0');
    });
  });

  describe('public API', () => {
    it('should prove a pair from literature, transforms and a beta bound', () => {
      const set = new HypothesisSet([
        trivialExpPair,
        literatureExpPair('1/2', '1/2', Reference.literature('Alpha', 1950)),
        vanDerCorputA,
        vanDerCorputB,
        betaBoundHypothesis(
          new AffinePiece('1/3', '1/6', new Interval(0, '1/2')),
          Reference.literature('Gamma', 1970)
        ),
      ]);
      const prover = createProver('', {});

      const outcome = prover.findBestProof('1/6', '1/2', set, 'date');

      expect(outcome.status).toBe('proved');
      if (outcome.status === 'proved') {
        expect(outcome.proof.data.toString()).toBe('(1/6, 1/2)');
        expect(outcome.proof.reference.year()).toEqual({ kind: 'known', value: 1970 });
      }
      expect(set.size).toBe(5);
    });
  });
});
