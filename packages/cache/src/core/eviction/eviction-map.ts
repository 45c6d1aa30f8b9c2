/**
 * Map-like storage that tracks which key to evict next. Used by the memory
 * cache store to bound its size.
 */
export interface EvictionMap<K, V> {
  /**
   * Value for `key`. LRU implementations count this as a use.
   */
  get(key: K): V | undefined

  /**
   * Insert or replace. Replacing may refresh the key's position.
   */
  set(key: K, value: V): void

  /** @returns `true` if the key was present. */
  delete(key: K): boolean

  /**
   * Remove every entry matching `predicate` without affecting the order of
   * the entries that remain.
   *
   * @returns the number of entries removed.
   */
  deleteWhere(predicate: (key: K, value: V) => boolean): number

  has(key: K): boolean

  size(): number

  /**
   * Key the policy would evict next, or `undefined` when empty. Does not
   * remove it.
   */
  victim(): K | undefined
}
