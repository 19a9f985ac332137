/**
 * Mutable, ordered collection of hypotheses with a derived-data cache.
 *
 * @packageDocumentation
 */

import type { Hypothesis, HypothesisType } from './hypothesis.js';

/**
 * Data derived from the contents of a set. Only meaningful while `valid` is true.
 */
export interface DerivedDataCache {
  /** Cleared by every insertion that changes the set. */
  readonly valid: boolean;
  /** Exponent-pair hypotheses on the convex hull of the set's pairs. */
  readonly convexHull: readonly Hypothesis<'Exponent pair'>[] | undefined;
}

const EMPTY_CACHE: DerivedDataCache = Object.freeze({ valid: false, convexHull: undefined });

/**
 * Ordered collection of hypotheses, deduplicated by payload key (the first
 * hypothesis inserted for a key is kept).
 *
 * Holds a {@link DerivedDataCache}. Inserting a new hypothesis invalidates it, so a
 * cached convex hull can never outlive a change to the pairs it was computed from.
 *
 * @example
 * ```typescript
 * const set = new HypothesisSet([trivialExpPair, vanDerCorputB]);
 * set.listHypotheses('Exponent pair'); // [trivialExpPair]
 * set.findHypothesis('van der Corput B transform'); // vanDerCorputB
 * ```
 */
export class HypothesisSet implements Iterable<Hypothesis> {
  private readonly items: Hypothesis[] = [];
  private readonly keys = new Set<string>();
  private derived: DerivedDataCache = EMPTY_CACHE;

  /**
   * Creates a set from an optional initial collection.
   */
  constructor(hypotheses: Iterable<Hypothesis> = []) {
    this.addHypotheses(hypotheses);
  }

  /**
   * Number of hypotheses in the set.
   */
  get size(): number {
    return this.items.length;
  }

  /**
   * Current derived-data cache.
   */
  get cache(): DerivedDataCache {
    return this.derived;
  }

  /**
   * Stores a computed convex hull and marks the cache valid.
   */
  storeConvexHull(hull: readonly Hypothesis<'Exponent pair'>[]): void {
    this.derived = { valid: true, convexHull: hull };
  }

  /**
   * Checks whether a hypothesis with the same payload key is present.
   */
  has(hypothesis: Hypothesis): boolean {
    return this.keys.has(hypothesis.key());
  }

  /**
   * Adds a hypothesis unless one with the same key is present.
   *
   * @returns True if the hypothesis was added.
   */
  addHypothesis(hypothesis: Hypothesis): boolean {
    const key = hypothesis.key();
    if (this.keys.has(key)) {
      return false;
    }
    this.items.push(hypothesis);
    this.keys.add(key);
    this.derived = EMPTY_CACHE;
    return true;
  }

  /**
   * Adds every hypothesis of an iterable, skipping duplicates.
   *
   * @returns The number of hypotheses added.
   */
  addHypotheses(hypotheses: Iterable<Hypothesis>): number {
    let added = 0;
    for (const hypothesis of hypotheses) {
      if (this.addHypothesis(hypothesis)) {
        added++;
      }
    }
    return added;
  }

  /**
   * Lists hypotheses of one type, in insertion order.
   */
  listHypotheses<T extends HypothesisType>(type: T): Hypothesis<T>[] {
    const result: Hypothesis<T>[] = [];
    for (const hypothesis of this.items) {
      if (hypothesis.is(type)) {
        result.push(hypothesis);
      }
    }
    return result;
  }

  /**
   * Finds the first hypothesis whose name contains the keyword
   * (case-insensitive).
   */
  findHypothesis(keyword: string): Hypothesis | undefined {
    const needle = keyword.toLowerCase();
    return this.items.find((h) => h.name.toLowerCase().includes(needle));
  }

  /**
   * Finds the first hypothesis of a type whose name contains the keyword
   * (case-insensitive).
   */
  findHypothesisOfType<T extends HypothesisType>(
    keyword: string,
    type: T
  ): Hypothesis<T> | undefined {
    const needle = keyword.toLowerCase();
    return this.listHypotheses(type).find((h) => h.name.toLowerCase().includes(needle));
  }

  /**
   * Returns a new set with the hypotheses matching a predicate.
   */
  filter(predicate: (hypothesis: Hypothesis) => boolean): HypothesisSet {
    return new HypothesisSet(this.items.filter(predicate));
  }

  /**
   * Shallow copy: the same hypothesis objects in a new container, with its own
   * cache state. Inserting into the copy never affects this set.
   */
  copy(): HypothesisSet {
    const clone = new HypothesisSet(this.items);
    clone.derived = this.derived;
    return clone;
  }

  [Symbol.iterator](): IterableIterator<Hypothesis> {
    return this.items[Symbol.iterator]();
  }
}
