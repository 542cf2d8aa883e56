/**
 * Least Recently Used: evicts the entry untouched for the longest time.
 */
export type LruCacheEvictionPolicy = "lru"

/**
 * First In, First Out: evicts in insertion order, ignoring reads.
 */
export type FifoCacheEvictionPolicy = "fifo"

export type CacheEvictionPolicy = LruCacheEvictionPolicy | FifoCacheEvictionPolicy
