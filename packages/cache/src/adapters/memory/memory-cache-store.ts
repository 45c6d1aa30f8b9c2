import type { Logger } from "@tablecache/logger"
import type { EvictionMap } from "../../core/eviction/eviction-map"
import { CacheError } from "../../core/cache-error"
import { toStorageKey } from "../../core/storage-key"
import type { OperationKey, TableName } from "../../ports/cache-key"
import type { CachePayload, CacheSerializer } from "../../ports/cache-serializer"
import type { CacheStore } from "../../ports/cache-store"

export type MemoryCacheStoreOptions = {
  /**
   * Maximum number of entries retained across all tables. Inserting a new
   * key past this limit evicts according to the map's policy.
   */
  maxEntries: number
}

export type MemoryCacheEntry = {
  table: TableName
  operation: OperationKey
  payload: CachePayload
}

export type MemoryCacheStoreDeps = {
  store: EvictionMap<string, MemoryCacheEntry>
  serializer: CacheSerializer
  logger: Logger
}

export class MemoryCacheStore implements CacheStore {
  private readonly logger: Logger

  public constructor(
    private readonly deps: MemoryCacheStoreDeps,
    private readonly opts: MemoryCacheStoreOptions,
  ) {
    if (!Number.isInteger(opts.maxEntries) || opts.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${opts.maxEntries}`)
    }

    this.logger = deps.logger.child({ module: "memory-cache-store" })
  }

  getCache(table: TableName, operation: OperationKey): CachePayload | undefined {
    return this.deps.store.get(toStorageKey({ table, operation }))?.payload
  }

  addCache(table: TableName, operation: OperationKey, value: unknown): void {
    const key = toStorageKey({ table, operation })

    let payload: CachePayload
    try {
      payload = this.deps.serializer.serialize(value)
    } catch (err) {
      this.deps.store.delete(key)
      this.logger.warn("Cache entry not stored", {
        table,
        operation,
        err: CacheError.encodeFailed(table, operation, err),
      })
      return
    }

    if (!this.deps.store.has(key)) this.ensureRoomForOne()

    this.deps.store.set(key, { table, operation, payload })
  }

  clearByTable(table: TableName): void {
    const removed = this.deps.store.deleteWhere((_key, entry) => entry.table === table)

    if (removed > 0) {
      this.logger.debug("Cache invalidated", { table, removed })
    }
  }

  get size(): number {
    return this.deps.store.size()
  }

  private ensureRoomForOne(): void {
    while (this.deps.store.size() >= this.opts.maxEntries) {
      const victim = this.deps.store.victim()

      if (victim === undefined) {
        throw new Error(
          "Invariant violation: EvictionMap.victim() returned undefined while at capacity",
        )
      }

      this.deps.store.delete(victim)
    }
  }
}
