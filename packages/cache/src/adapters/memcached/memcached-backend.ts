import { createHash } from "node:crypto"
import type { CacheOp } from "@stash/logger"
import type { Clock } from "../../core/time/clock"
import { BackendError } from "../../errors/cache-errors"
import type { Backend, BackendSetOptions } from "../../ports/backend"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { Seconds } from "../../ports/time"
import type { MemcachedClient } from "./memcached-client"

export const MAX_MEMCACHED_KEY_BYTES = 250

/** Longest `expires` memcached reads as relative; larger values are epochs. */
export const MAX_RELATIVE_EXPIRY_SECONDS: Seconds = 60 * 60 * 24 * 30

const PRUNE_INTERVAL_MS = 1_000

const UNSAFE_KEY_CHAR = /[\s\x00-\x1f\x7f]/

export type MemcachedBackendDeps = {
  client: MemcachedClient
  clock: Clock
}

/** Maps a cache key onto one memcached accepts. */
export function toMemcachedKey(key: CacheKey): string {
  if (Buffer.byteLength(key, "utf8") <= MAX_MEMCACHED_KEY_BYTES && !UNSAFE_KEY_CHAR.test(key)) {
    return key
  }

  return `#${createHash("sha256").update(key, "utf8").digest("hex")}`
}

/**
 * Memcached has no key listing, so written keys are tracked in process for
 * `clear(namespace)`. The index only covers this process's writes; it holds
 * each key's expiry and drops expired keys on `set` (at most once a second)
 * and on `clear`.
 */
export class MemcachedBackend implements Backend {
  readonly kind = "memcached"

  private readonly written = new Map<CacheKey, number>()
  private nextPruneAtMs = 0

  public constructor(private readonly deps: MemcachedBackendDeps) {}

  async get(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    const value = await this.op("get", key, () => this.deps.client.get(toMemcachedKey(key)))

    if (value === null) {
      this.written.delete(key)
      return { kind: "miss" }
    }

    return { kind: "hit", value: new Uint8Array(value), meta: {} }
  }

  async set(key: CacheKey, value: Uint8Array, opts: BackendSetOptions): Promise<void> {
    await this.op("set", key, () =>
      this.deps.client.set(toMemcachedKey(key), Buffer.from(value), this.expires(opts.ttl)),
    )

    const now = this.deps.clock.nowMs()
    if (now >= this.nextPruneAtMs) {
      this.prune(now)
      this.nextPruneAtMs = now + PRUNE_INTERVAL_MS
    }

    this.written.set(key, now + opts.ttl * 1000)
  }

  async invalidate(key: CacheKey): Promise<boolean> {
    const deleted = await this.op("invalidate", key, () =>
      this.deps.client.delete(toMemcachedKey(key)),
    )

    this.written.delete(key)

    return deleted
  }

  async clear(namespace: string): Promise<number> {
    this.prune(this.deps.clock.nowMs())

    const prefix = `${namespace}:`
    const keys = [...this.written.keys()].filter((key) => key.startsWith(prefix))
    let removed = 0

    for (const key of keys) {
      if (await this.invalidate(key)) removed++
    }

    return removed
  }

  async close(): Promise<void> {
    this.written.clear()
    this.deps.client.close()
  }

  /** Keys currently held in the clear index. */
  trackedKeys(): number {
    return this.written.size
  }

  private prune(now: number): void {
    for (const [key, expiresAtMs] of this.written) {
      if (expiresAtMs <= now) this.written.delete(key)
    }
  }

  private expires(ttl: Seconds): Seconds {
    if (ttl <= MAX_RELATIVE_EXPIRY_SECONDS) return ttl

    return Math.floor(this.deps.clock.nowMs() / 1000) + ttl
  }

  private async op<T>(op: CacheOp, key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw BackendError.from(err, { backend: this.kind, op, key })
    }
  }
}
