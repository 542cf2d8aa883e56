/**
 * Map-like storage that decides which key goes first when the memory backend
 * runs out of room. Ordering side effects (touch-on-read for LRU) live here.
 */
export interface EvictionMap<K, V> {
  /** May update ordering. */
  get(key: K): V | undefined

  /** Inserts or replaces. May update ordering. */
  set(key: K, value: V): void

  delete(key: K): boolean

  /** Reads without affecting ordering. */
  peek(key: K): V | undefined

  has(key: K): boolean

  size(): number

  /** Next key to evict, or `undefined` when empty. */
  victim(): K | undefined

  /** Snapshot of the current keys. Does not affect ordering. */
  keys(): K[]
}
