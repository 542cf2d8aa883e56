import type { Logger } from "@stash/logger"
import { createClient, RESP_TYPES } from "redis"
import type { Milliseconds } from "../../ports/time"

/**
 * The node-redis surface the backend uses, with blob strings mapped to
 * `Buffer` so values come back byte-exact.
 */
export type RedisBytesClient = {
  readonly isOpen: boolean

  connect(): Promise<unknown>
  close(): Promise<void>

  get(key: string): Promise<Buffer | null>
  pTTL(key: string): Promise<number>
  set(key: string, value: Uint8Array | Buffer, opts: { EX: number }): Promise<unknown>
  unlink(keys: string | string[]): Promise<number>

  scan(
    cursor: string,
    opts: { MATCH: string; COUNT: number },
  ): Promise<{ cursor: string | Buffer; keys: (string | Buffer)[] }>
}

export type RedisClientOptions = {
  url: string
  connectTimeoutMs?: Milliseconds
  /** Upper bound for the delay between reconnect attempts. */
  maxReconnectDelayMs?: Milliseconds
}

/**
 * Commands fail immediately while disconnected instead of queueing, and the
 * socket reconnects in the background with linear backoff.
 */
export function createRedisBytesClient(
  options: RedisClientOptions,
  logger?: Logger,
): RedisBytesClient {
  const maxDelay = options.maxReconnectDelayMs ?? 2_000

  const client = createClient({
    url: options.url,
    disableOfflineQueue: true,
    socket: {
      connectTimeout: options.connectTimeoutMs ?? 5_000,
      reconnectStrategy: (retries: number) => Math.min(retries * 50, maxDelay),
    },
  })

  client.on("error", (err: unknown) => {
    logger?.warn("redis client error", { backend: "redis", err })
  })

  return client.withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}
