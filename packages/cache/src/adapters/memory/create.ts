import type { Logger } from "@tablecache/logger"
import type { EvictionMap } from "../../core/eviction/eviction-map"
import { FifoMemoryMap } from "../../core/eviction/fifo-memory-map"
import { LruMemoryMap } from "../../core/eviction/lru-memory-map"
import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import type { CacheSerializer } from "../../ports/cache-serializer"
import type { CacheStore } from "../../ports/cache-store"
import { SuperjsonSerializer } from "../superjson/superjson-serializer"
import { type MemoryCacheEntry, MemoryCacheStore } from "./memory-cache-store"

export type CreateMemoryCacheStoreOptions = {
  maxEntries: number
  eviction?: CacheEvictionPolicy
}

export type CreateMemoryCacheStoreDeps = {
  logger: Logger
  serializer?: CacheSerializer
}

export function createMemoryCacheStore(
  opts: CreateMemoryCacheStoreOptions,
  deps: CreateMemoryCacheStoreDeps,
): CacheStore {
  return new MemoryCacheStore(
    {
      store: createEvictionMap(opts.eviction ?? "lru"),
      serializer: deps.serializer ?? new SuperjsonSerializer(),
      logger: deps.logger,
    },
    { maxEntries: opts.maxEntries },
  )
}

function createEvictionMap(
  policy: CacheEvictionPolicy,
): EvictionMap<string, MemoryCacheEntry> {
  switch (policy) {
    case "lru":
      return new LruMemoryMap()
    case "fifo":
      return new FifoMemoryMap()
  }
}
