import { Client } from "memjs"
import type { Milliseconds, Seconds } from "../../ports/time"

/**
 * The memjs calls the backend makes. `expires` follows the memcached
 * protocol: up to 30 days it is relative, beyond that an epoch second.
 */
export type MemcachedClient = {
  get(key: string): Promise<Buffer | null>
  set(key: string, value: Buffer, expires: Seconds): Promise<boolean>
  delete(key: string): Promise<boolean>
  close(): void
}

export type MemcachedClientOptions = {
  /** Comma-separated `host:port` list. */
  servers: string
  timeoutMs?: Milliseconds
}

export function createMemcachedClient(options: MemcachedClientOptions): MemcachedClient {
  const client = Client.create(options.servers, {
    timeout: (options.timeoutMs ?? 1_000) / 1000,
    retries: 1,
  })

  return {
    async get(key) {
      const { value } = await client.get(key)
      return value ?? null
    },
    async set(key, value, expires) {
      return Boolean(await client.set(key, value, { expires }))
    },
    async delete(key) {
      return Boolean(await client.delete(key))
    },
    close() {
      client.close()
    },
  }
}
