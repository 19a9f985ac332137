/**
 * Hypotheses: citable or derived statements with provenance.
 *
 * @packageDocumentation
 */

import type { BetaBoundPiece } from '../beta/bound.js';
import type { ExponentPair, ExponentPairTransform } from '../exponent-pair/types.js';
import type { Reference } from './reference.js';

/**
 * Payload carried by each hypothesis type.
 */
export interface HypothesisPayloads {
  'Exponent pair': ExponentPair;
  'Exponent pair transform': ExponentPairTransform;
  'Upper bound on beta': BetaBoundPiece;
}

/**
 * Type tag of a hypothesis.
 */
export type HypothesisType = keyof HypothesisPayloads;

/**
 * Fields required to construct a hypothesis.
 */
export interface HypothesisInit<T extends HypothesisType> {
  /** Display name. */
  name: string;
  /** Type tag. */
  type: T;
  /** Payload matching the type tag. */
  data: HypothesisPayloads[T];
  /** Free-text proof narrative. */
  proof: string;
  /** Where the result comes from. */
  reference: Reference;
  /** Hypotheses this one was derived from. */
  dependencies?: Iterable<Hypothesis> | undefined;
}

/**
 * An immutable statement with a payload, a proof narrative, a reference and the
 * set of hypotheses it depends on.
 *
 * Two hypotheses with the same {@link Hypothesis.key} are duplicates, whatever
 * their provenance.
 *
 * @example
 * ```typescript
 * const h = new Hypothesis({
 *   name: 'Trivial exponent pair (0, 1)',
 *   type: 'Exponent pair',
 *   data: new ExponentPair(Rational.ZERO, Rational.ONE),
 *   proof: 'Triangle inequality',
 *   reference: Reference.trivial(),
 * });
 * h.proofComplexity(); // 1
 * ```
 */
export class Hypothesis<T extends HypothesisType = HypothesisType> {
  readonly name: string;
  readonly type: T;
  readonly data: HypothesisPayloads[T];
  readonly proof: string;
  readonly reference: Reference;
  readonly dependencies: ReadonlySet<Hypothesis>;
  private complexity: number | undefined;

  constructor(init: HypothesisInit<T>) {
    this.name = init.name;
    this.type = init.type;
    this.data = init.data;
    this.proof = init.proof;
    this.reference = init.reference;
    this.dependencies = new Set(init.dependencies ?? []);
  }

  /**
   * Deduplication key: the type tag plus the payload's own key.
   */
  key(): string {
    return `${this.type}:${this.data.key()}`;
  }

  /**
   * Narrows this hypothesis to a given type tag.
   */
  is<U extends HypothesisType>(type: U): this is Hypothesis<U> {
    const tag: HypothesisType = this.type;
    return tag === type;
  }

  /**
   * Size of the proof tree: 1 for a hypothesis without dependencies, otherwise
   * one more than the sum over its dependencies. Memoized.
   */
  proofComplexity(): number {
    if (this.complexity === undefined) {
      let total = 1;
      for (const dependency of this.dependencies) {
        total += dependency.proofComplexity();
      }
      this.complexity = total;
    }
    return this.complexity;
  }

  toString(): string {
    return `${this.name} ${this.reference.toString()}`;
  }
}
