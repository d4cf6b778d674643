/**
 * Keyed Index
 *
 * A map from key to a set of values. Backs the label index, declared
 * property indices and any secondary index a caller maintains itself.
 */

const EMPTY: ReadonlySet<never> = new Set<never>()

export class KeyedIndex<K, V> {
  private readonly entries = new Map<K, Set<V>>()

  /**
   * Add a value under a key. Adding the same value twice is a no-op.
   */
  put(key: K, value: V): void {
    let bucket = this.entries.get(key)
    if (!bucket) {
      bucket = new Set()
      this.entries.set(key, bucket)
    }
    bucket.add(value)
  }

  /**
   * Remove a value from a key's bucket, dropping the bucket once empty.
   */
  remove(key: K, value: V): void {
    const bucket = this.entries.get(key)
    if (!bucket) return
    bucket.delete(value)
    if (bucket.size === 0) this.entries.delete(key)
  }

  /**
   * Values stored under a key (empty set if the key is unknown).
   */
  get(key: K): ReadonlySet<V> {
    return this.entries.get(key) ?? EMPTY
  }

  has(key: K): boolean {
    return this.entries.has(key)
  }

  keys(): IterableIterator<K> {
    return this.entries.keys()
  }

  /** Number of distinct keys */
  get size(): number {
    return this.entries.size
  }
}
