/**
 * Exponent pair and transform records.
 *
 * @packageDocumentation
 */

import { Rational } from '../numeric/index.js';
import type { RationalLike } from '../numeric/index.js';
import type { Point } from '../geometry/index.js';
import type { Hypothesis } from '../knowledge/hypothesis.js';

/**
 * An exponent pair (k, l), up to epsilon losses, in the sense of van der
 * Corput's method. Equality is exact equality of both coordinates.
 */
export class ExponentPair {
  readonly k: Rational;
  readonly l: Rational;

  constructor(k: RationalLike, l: RationalLike) {
    this.k = Rational.from(k);
    this.l = Rational.from(l);
  }

  /**
   * Deduplication key; equal pairs share a key.
   */
  key(): string {
    return `${this.k.key()},${this.l.key()}`;
  }

  equals(other: ExponentPair): boolean {
    return this.k.equals(other.k) && this.l.equals(other.l);
  }

  /**
   * The pair as a point in the (k, l) plane.
   */
  toPoint(): Point {
    return { x: this.k, y: this.l };
  }

  toString(): string {
    return `(${this.k.toString()}, ${this.l.toString()})`;
  }
}

/**
 * Maps an exponent-pair hypothesis to the hypothesis obtained by applying a
 * transform once. Must be deterministic on pair keys.
 */
export type TransformFunction = (
  hypothesis: Hypothesis<'Exponent pair'>
) => Hypothesis<'Exponent pair'>;

/**
 * A named transform mapping exponent pairs to exponent pairs, such as the
 * van der Corput A and B processes.
 */
export class ExponentPairTransform {
  readonly name: string;
  readonly transform: TransformFunction;

  constructor(name: string, transform: TransformFunction) {
    this.name = name;
    this.transform = transform;
  }

  key(): string {
    return this.name;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Convenience accessor for the point of an exponent-pair hypothesis.
 */
export function pairPoint(hypothesis: Hypothesis<'Exponent pair'>): Point {
  return hypothesis.data.toPoint();
}

/**
 * Strategy for choosing among proofs of the same exponent pair.
 *
 * - `date`: the historically earliest proof
 * - `complexity`: the containing triangle with the smallest total proof complexity
 * - `none`: no optimization (not supported; reported as such)
 */
export type ProofOptimizationMethod = 'date' | 'complexity' | 'none';

/**
 * All proof optimization methods.
 */
export const PROOF_OPTIMIZATION_METHODS: readonly ProofOptimizationMethod[] = [
  'date',
  'complexity',
  'none',
] as const;

/**
 * Checks whether a value is a recognized proof optimization method.
 */
export function isProofOptimizationMethod(value: unknown): value is ProofOptimizationMethod {
  return PROOF_OPTIMIZATION_METHODS.some((method) => method === value);
}
