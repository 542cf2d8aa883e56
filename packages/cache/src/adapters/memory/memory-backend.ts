import type { Logger } from "@stash/logger"
import type { EvictionMap } from "../../core/eviction/eviction-map"
import type { Clock } from "../../core/time/clock"
import type { Backend, BackendSetOptions } from "../../ports/backend"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { Milliseconds } from "../../ports/time"

export type MemoryBackendOptions = {
  /**
   * Maximum number of entries retained. Past it, entries are evicted in the
   * order chosen by the store's eviction policy.
   */
  maxEntries: number

  /** Background reaping period. `0` disables the reaper. */
  reapIntervalMs?: Milliseconds
}

export type MemoryBackendDeps = {
  clock: Clock
  store: EvictionMap<CacheKey, MemoryEntry>
  logger?: Logger
}

export type MemoryEntry = {
  value: Uint8Array
  expiresAtMs: Milliseconds
}

export class MemoryBackend implements Backend {
  readonly kind = "memory"

  private readonly reaper: NodeJS.Timeout | undefined

  public constructor(
    private readonly deps: MemoryBackendDeps,
    private readonly opts: MemoryBackendOptions,
  ) {
    if (!Number.isInteger(opts.maxEntries) || opts.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${opts.maxEntries}`)
    }

    const interval = opts.reapIntervalMs ?? 0
    if (interval > 0) {
      this.reaper = setInterval(() => this.reap(), interval)
      this.reaper.unref()
    }
  }

  async get(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    const entry = this.deps.store.get(key)
    if (entry === undefined) return { kind: "miss" }

    const ttlMs = entry.expiresAtMs - this.deps.clock.nowMs()

    if (ttlMs <= 0) {
      this.deps.store.delete(key)
      return { kind: "miss" }
    }

    return { kind: "hit", value: entry.value.slice(), meta: { ttlMs } }
  }

  async set(key: CacheKey, value: Uint8Array, opts: BackendSetOptions): Promise<void> {
    if (!this.deps.store.has(key)) this.makeRoom()

    this.deps.store.set(key, {
      value: value.slice(),
      expiresAtMs: this.deps.clock.nowMs() + opts.ttl * 1000,
    })
  }

  async invalidate(key: CacheKey): Promise<boolean> {
    return this.deps.store.delete(key)
  }

  async clear(namespace: string): Promise<number> {
    const prefix = `${namespace}:`
    let removed = 0

    for (const key of this.deps.store.keys()) {
      if (key.startsWith(prefix) && this.deps.store.delete(key)) removed++
    }

    return removed
  }

  async close(): Promise<void> {
    if (this.reaper) clearInterval(this.reaper)
  }

  /** Removes expired entries now and reports how many went. */
  purgeExpired(): number {
    const now = this.deps.clock.nowMs()
    let removed = 0

    for (const key of this.deps.store.keys()) {
      const entry = this.deps.store.peek(key)
      if (entry && entry.expiresAtMs <= now && this.deps.store.delete(key)) removed++
    }

    return removed
  }

  size(): number {
    return this.deps.store.size()
  }

  private reap(): void {
    const removed = this.purgeExpired()

    if (removed > 0) {
      this.deps.logger?.debug("memory backend reaped expired entries", {
        backend: this.kind,
        removed,
      })
    }
  }

  private makeRoom(): void {
    while (this.deps.store.size() >= this.opts.maxEntries) {
      const victim = this.deps.store.victim()

      if (victim === undefined) {
        throw new Error("Invariant violation: EvictionMap.victim() returned undefined while full")
      }

      this.deps.store.delete(victim)
    }
  }
}
