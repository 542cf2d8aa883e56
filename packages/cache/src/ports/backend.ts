import type { CacheKey } from "./cache-key"
import type { CacheResult } from "./cache-result"
import type { Seconds } from "./time"

export type BackendSetOptions = {
  /** Positive whole number of seconds. */
  ttl: Seconds
}

/**
 * Byte-oriented storage shared by every cached handler.
 *
 * @remarks
 * - `get` misses for absent and for expired entries alike.
 * - `set` overwrites unconditionally; the last write wins.
 * - Implementations are used concurrently and must not assume call ordering.
 */
export interface Backend {
  /** Short backend name used in logs, e.g. `"memory"` or `"redis"`. */
  readonly kind: string

  get(key: CacheKey): Promise<CacheResult<Uint8Array>>

  set(key: CacheKey, value: Uint8Array, opts: BackendSetOptions): Promise<void>

  /** Returns `true` when an entry was removed. */
  invalidate(key: CacheKey): Promise<boolean>

  /**
   * Remove every entry whose key starts with `"<namespace>:"`.
   *
   * @returns the number of entries removed
   */
  clear(namespace: string): Promise<number>

  /** Release connections and timers. The backend is unusable afterwards. */
  close(): Promise<void>
}
