/**
 * Evicts the entry that has gone unread the longest. Default.
 */
export type LruCacheEvictionPolicy = "lru"

/**
 * Evicts entries in insertion order, regardless of reads.
 */
export type FifoCacheEvictionPolicy = "fifo"

export type CacheEvictionPolicy = LruCacheEvictionPolicy | FifoCacheEvictionPolicy

export const cacheEvictionPolicies = ["lru", "fifo"] as const satisfies readonly CacheEvictionPolicy[]
