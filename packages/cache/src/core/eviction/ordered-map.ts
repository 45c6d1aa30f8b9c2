import type { EvictionMap } from "./eviction-map"

/**
 * Insertion-ordered storage shared by the eviction policies. Subclasses only
 * decide whether reads and overwrites move a key to the back.
 */
export abstract class OrderedMemoryMap<K, V> implements EvictionMap<K, V> {
  protected readonly map = new Map<K, V>()

  abstract get(key: K): V | undefined

  abstract set(key: K, value: V): void

  delete(key: K): boolean {
    return this.map.delete(key)
  }

  deleteWhere(predicate: (key: K, value: V) => boolean): number {
    const doomed: K[] = []

    for (const [key, value] of this.map) {
      if (predicate(key, value)) doomed.push(key)
    }

    for (const key of doomed) {
      this.map.delete(key)
    }

    return doomed.length
  }

  has(key: K): boolean {
    return this.map.has(key)
  }

  size(): number {
    return this.map.size
  }

  victim(): K | undefined {
    for (const key of this.map.keys()) return key

    return undefined
  }
}
