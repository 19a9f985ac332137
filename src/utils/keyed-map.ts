/**
 * Map keyed by structured values.
 *
 * JavaScript's Map compares object keys by identity, so two equal exponent
 * pairs would be distinct keys. KeyedMap derives a string identity from each key
 * through a key function and compares by that identity instead.
 *
 * @packageDocumentation
 */

/**
 * Map from structured keys to values, compared by a derived string identity.
 * Iteration follows insertion order.
 *
 * @example
 * ```ts
 * const pairs = new KeyedMap<ExponentPair, Hypothesis<'Exponent pair'>>((p) => p.key());
 * pairs.set(new ExponentPair('1/2', '1/2'), h);
 * pairs.has(new ExponentPair('2/4', '1/2')); // true
 * ```
 *
 * @template K - The type of keys in the map.
 * @template V - The type of values in the map.
 */
export class KeyedMap<K, V> {
  private readonly map = new Map<string, [K, V]>();
  private readonly keyOf: (key: K) => string;

  /**
   * @param keyOf - Derives the identity of a key. Equal keys must map to the same
   * string.
   */
  constructor(keyOf: (key: K) => string) {
    this.keyOf = keyOf;
  }

  /**
   * Creates a map from values, deriving each value's key. Earlier values win
   * over later ones with the same key.
   */
  static fromValues<K, V>(
    values: Iterable<V>,
    keyOfValue: (value: V) => K,
    keyOf: (key: K) => string
  ): KeyedMap<K, V> {
    const keyed = new KeyedMap<K, V>(keyOf);
    for (const value of values) {
      keyed.setIfAbsent(keyOfValue(value), value);
    }
    return keyed;
  }

  get(key: K): V | undefined {
    return this.map.get(this.keyOf(key))?.[1];
  }

  set(key: K, value: V): this {
    this.map.set(this.keyOf(key), [key, value]);
    return this;
  }

  /**
   * Sets a value only if the key is not present.
   *
   * @returns True if the value was inserted.
   */
  setIfAbsent(key: K, value: V): boolean {
    const id = this.keyOf(key);
    if (this.map.has(id)) {
      return false;
    }
    this.map.set(id, [key, value]);
    return true;
  }

  has(key: K): boolean {
    return this.map.has(this.keyOf(key));
  }

  delete(key: K): boolean {
    return this.map.delete(this.keyOf(key));
  }

  /**
   * Snapshot of the keys at the time of the call. Safe to iterate while the map
   * is being extended.
   */
  keys(): K[] {
    return [...this.map.values()].map(([key]) => key);
  }

  values(): V[] {
    return [...this.map.values()].map(([, value]) => value);
  }

  get size(): number {
    return this.map.size;
  }

  clear(): void {
    this.map.clear();
  }

  *[Symbol.iterator](): IterableIterator<[K, V]> {
    for (const [key, value] of this.map.values()) {
      yield [key, value];
    }
  }
}
