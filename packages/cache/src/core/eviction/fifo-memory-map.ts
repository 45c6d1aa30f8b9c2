import { OrderedMemoryMap } from "./ordered-map"

export class FifoMemoryMap<K, V> extends OrderedMemoryMap<K, V> {
  get(key: K): V | undefined {
    return this.map.get(key)
  }

  /** Overwrites keep the key's original position. */
  set(key: K, value: V): void {
    this.map.set(key, value)
  }
}
