export { createMemoryCacheStore } from "./adapters/memory/create"
export type {
  CreateMemoryCacheStoreDeps,
  CreateMemoryCacheStoreOptions,
} from "./adapters/memory/create"
export {
  type MemoryCacheEntry,
  MemoryCacheStore,
  type MemoryCacheStoreDeps,
  type MemoryCacheStoreOptions,
} from "./adapters/memory/memory-cache-store"
export { SuperjsonSerializer } from "./adapters/superjson/superjson-serializer"
export { CacheError, type CacheErrorCode } from "./core/cache-error"
export type { EvictionMap } from "./core/eviction/eviction-map"
export { FifoMemoryMap } from "./core/eviction/fifo-memory-map"
export { LruMemoryMap } from "./core/eviction/lru-memory-map"
export {
  type CacheEvictionPolicy,
  cacheEvictionPolicies,
} from "./ports/cache-eviction-policy"
export type { CacheKey, OperationKey, TableName } from "./ports/cache-key"
export type { CachePayload, CacheSerializer } from "./ports/cache-serializer"
export type { CacheStore } from "./ports/cache-store"
