import type { CacheOp } from "@stash/logger"
import { withTimeout } from "../../core/time/with-timeout"
import { BackendError } from "../../errors/cache-errors"
import type { Backend, BackendSetOptions } from "../../ports/backend"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { Milliseconds } from "../../ports/time"
import type { RedisBytesClient } from "./redis-client"

export type RedisBackendOptions = {
  /** Upper bound on each backend operation, `clear` included. */
  opTimeoutMs: Milliseconds

  /** `COUNT` hint for each `SCAN` page during `clear`. */
  scanCount: number
}

const GLOB_SPECIAL = /[*?[\]\\]/g

/** Escapes `MATCH` metacharacters so the namespace is matched literally. */
export function escapeGlob(text: string): string {
  return text.replace(GLOB_SPECIAL, (ch) => `\\${ch}`)
}

export class RedisBackend implements Backend {
  readonly kind = "redis"

  public constructor(
    private readonly client: RedisBytesClient,
    private readonly opts: RedisBackendOptions,
  ) {}

  async get(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    const [buffer, pttl] = await this.op("get", key, () =>
      Promise.all([this.client.get(key), this.client.pTTL(key)]),
    )

    if (buffer === null) return { kind: "miss" }

    // -1: no expiry, -2: gone between the two commands.
    return {
      kind: "hit",
      value: new Uint8Array(buffer),
      meta: pttl >= 0 ? { ttlMs: pttl } : {},
    }
  }

  async set(key: CacheKey, value: Uint8Array, opts: BackendSetOptions): Promise<void> {
    await this.op("set", key, () => this.client.set(key, value, { EX: opts.ttl }))
  }

  async invalidate(key: CacheKey): Promise<boolean> {
    const removed = await this.op("invalidate", key, () => this.client.unlink(key))

    return removed > 0
  }

  async clear(namespace: string): Promise<number> {
    const match = `${escapeGlob(namespace)}:*`

    return this.op("clear", namespace, async () => {
      let cursor = "0"
      let removed = 0

      do {
        const page = await this.client.scan(cursor, { MATCH: match, COUNT: this.opts.scanCount })
        cursor = page.cursor.toString()

        const keys = page.keys.map((k) => k.toString())
        if (keys.length > 0) removed += await this.client.unlink(keys)
      } while (cursor !== "0")

      return removed
    })
  }

  async close(): Promise<void> {
    if (this.client.isOpen) await this.client.close()
  }

  private async op<T>(op: CacheOp, key: string, fn: () => Promise<T>): Promise<T> {
    const context = { backend: this.kind, op, key }

    try {
      return await withTimeout(fn(), this.opts.opTimeoutMs, () => {
        return new BackendError(`redis ${op} timed out after ${this.opts.opTimeoutMs}ms`, {
          code: "backend_timeout",
          context,
        })
      })
    } catch (err) {
      throw BackendError.from(err, context)
    }
  }
}
