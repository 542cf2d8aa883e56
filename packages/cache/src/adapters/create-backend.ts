import type { Logger } from "@stash/logger"
import type { BackendConfig } from "../config/cache-config"
import { FifoMemoryMap } from "../core/eviction/fifo-memory-map"
import { LruMemoryMap } from "../core/eviction/lru-memory-map"
import type { Clock } from "../core/time/clock"
import type { Backend } from "../ports/backend"
import { DynamoDbBackend } from "./dynamodb/dynamodb-backend"
import { createDynamoDbClient, type DynamoDbTableClient } from "./dynamodb/dynamodb-table-client"
import { MemcachedBackend } from "./memcached/memcached-backend"
import { createMemcachedClient, type MemcachedClient } from "./memcached/memcached-client"
import { type MemoryEntry, MemoryBackend } from "./memory/memory-backend"
import { RedisBackend } from "./redis/redis-backend"
import { createRedisBytesClient, type RedisBytesClient } from "./redis/redis-client"

export type CreateBackendDeps = {
  clock: Clock
  logger?: Logger
  /** Client factories; the real clients are used when omitted. */
  clients?: {
    redis?: () => RedisBytesClient
    memcached?: () => MemcachedClient
    dynamodb?: () => DynamoDbTableClient
  }
}

/**
 * Builds the configured backend. Redis connects before this resolves, so a
 * bad URL fails at startup rather than on the first request.
 */
export async function createBackend(
  config: BackendConfig,
  deps: CreateBackendDeps,
): Promise<Backend> {
  const { clock, logger, clients = {} } = deps

  switch (config.kind) {
    case "memory": {
      const store =
        config.eviction === "fifo"
          ? new FifoMemoryMap<string, MemoryEntry>()
          : new LruMemoryMap<string, MemoryEntry>()

      return new MemoryBackend(
        { clock, store, logger },
        { maxEntries: config.maxEntries, reapIntervalMs: config.reapIntervalMs },
      )
    }

    case "redis": {
      const client =
        clients.redis?.() ??
        createRedisBytesClient({ url: config.url, connectTimeoutMs: config.opTimeoutMs * 5 }, logger)

      if (!client.isOpen) await client.connect()

      return new RedisBackend(client, {
        opTimeoutMs: config.opTimeoutMs,
        scanCount: config.scanCount,
      })
    }

    case "memcached": {
      const client = clients.memcached?.() ?? createMemcachedClient({ servers: config.servers })

      return new MemcachedBackend({ client, clock })
    }

    case "dynamodb": {
      const client =
        clients.dynamodb?.() ??
        createDynamoDbClient({ region: config.region, endpoint: config.endpoint })

      return new DynamoDbBackend({ client, clock }, { tableName: config.table })
    }
  }
}
