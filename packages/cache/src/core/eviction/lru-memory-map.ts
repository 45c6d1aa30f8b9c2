import { OrderedMemoryMap } from "./ordered-map"

export class LruMemoryMap<K, V> extends OrderedMemoryMap<K, V> {
  get(key: K): V | undefined {
    const value = this.map.get(key)

    if (value === undefined) return undefined

    this.moveToBack(key, value)

    return value
  }

  /** Overwrites count as a use. */
  set(key: K, value: V): void {
    this.moveToBack(key, value)
  }

  private moveToBack(key: K, value: V): void {
    this.map.delete(key)
    this.map.set(key, value)
  }
}
