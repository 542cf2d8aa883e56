import type { Milliseconds } from "./time"

export type CacheHitMeta = {
  /** Remaining lifetime as reported by the backend, when it can tell. */
  ttlMs?: Milliseconds
}

export type CacheHit<T> = {
  kind: "hit"
  value: T
  meta: CacheHitMeta
}

export type CacheMiss = {
  kind: "miss"
}

export type CacheResult<T> = CacheHit<T> | CacheMiss
