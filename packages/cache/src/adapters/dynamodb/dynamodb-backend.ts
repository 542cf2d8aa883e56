import type { AttributeValue, WriteRequest } from "@aws-sdk/client-dynamodb"
import type { CacheOp } from "@stash/logger"
import type { Clock } from "../../core/time/clock"
import { BackendError } from "../../errors/cache-errors"
import type { Backend, BackendSetOptions } from "../../ports/backend"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { DynamoDbTableClient } from "./dynamodb-table-client"

/** BatchWriteItem's per-request limit. */
export const BATCH_WRITE_LIMIT = 25

export type DynamoDbBackendOptions = {
  tableName: string
  /** Extra BatchWriteItem rounds for unprocessed deletes during `clear`. */
  maxBatchRetries?: number
}

export type DynamoDbBackendDeps = {
  client: DynamoDbTableClient
  clock: Clock
}

type Item = Record<string, AttributeValue>

/**
 * Items are `{ key: S, value: B, ttl: N }` with `ttl` in epoch seconds, the
 * attribute to enable as the table's TTL. DynamoDB deletes expired items
 * lazily, so reads check `ttl` themselves.
 */
export class DynamoDbBackend implements Backend {
  readonly kind = "dynamodb"

  public constructor(
    private readonly deps: DynamoDbBackendDeps,
    private readonly opts: DynamoDbBackendOptions,
  ) {}

  async get(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    const { Item } = await this.op("get", key, () =>
      this.deps.client.getItem({
        TableName: this.opts.tableName,
        Key: { key: { S: key } },
        ConsistentRead: true,
      }),
    )

    const value = Item?.value?.B
    if (!Item || !value) return { kind: "miss" }

    const ttlMs = this.expiresAtMs(Item) - this.deps.clock.nowMs()
    if (ttlMs <= 0) return { kind: "miss" }

    return { kind: "hit", value: new Uint8Array(value), meta: { ttlMs } }
  }

  async set(key: CacheKey, value: Uint8Array, opts: BackendSetOptions): Promise<void> {
    const expiresAt = Math.ceil(this.deps.clock.nowMs() / 1000) + opts.ttl

    await this.op("set", key, () =>
      this.deps.client.putItem({
        TableName: this.opts.tableName,
        Item: {
          key: { S: key },
          value: { B: value.slice() },
          ttl: { N: String(expiresAt) },
        },
      }),
    )
  }

  async invalidate(key: CacheKey): Promise<boolean> {
    const { Attributes } = await this.op("invalidate", key, () =>
      this.deps.client.deleteItem({
        TableName: this.opts.tableName,
        Key: { key: { S: key } },
        ReturnValues: "ALL_OLD",
      }),
    )

    return Attributes !== undefined && this.expiresAtMs(Attributes) > this.deps.clock.nowMs()
  }

  async clear(namespace: string): Promise<number> {
    return this.op("clear", namespace, async () => {
      const keys = await this.scanKeys(`${namespace}:`)

      for (let i = 0; i < keys.length; i += BATCH_WRITE_LIMIT) {
        await this.deleteBatch(keys.slice(i, i + BATCH_WRITE_LIMIT))
      }

      return keys.length
    })
  }

  async close(): Promise<void> {
    this.deps.client.destroy()
  }

  private expiresAtMs(item: Item): number {
    const ttl = Number(item.ttl?.N)

    return Number.isFinite(ttl) ? ttl * 1000 : Number.POSITIVE_INFINITY
  }

  private async scanKeys(prefix: string): Promise<string[]> {
    const keys: string[] = []
    let startKey: Item | undefined

    do {
      const page = await this.deps.client.scan({
        TableName: this.opts.tableName,
        FilterExpression: "begins_with(#k, :prefix)",
        ProjectionExpression: "#k",
        ExpressionAttributeNames: { "#k": "key" },
        ExpressionAttributeValues: { ":prefix": { S: prefix } },
        ConsistentRead: true,
        ExclusiveStartKey: startKey,
      })

      for (const item of page.Items ?? []) {
        const key = item.key?.S
        if (key !== undefined) keys.push(key)
      }

      startKey = page.LastEvaluatedKey
    } while (startKey)

    return keys
  }

  private async deleteBatch(keys: readonly string[]): Promise<void> {
    let requests: WriteRequest[] = keys.map((key) => ({
      DeleteRequest: { Key: { key: { S: key } } },
    }))
    const maxRetries = this.opts.maxBatchRetries ?? 3

    for (let attempt = 0; requests.length > 0; attempt++) {
      if (attempt > maxRetries) {
        throw new BackendError("dynamodb clear left unprocessed deletes", {
          context: { backend: this.kind, op: "clear", unprocessed: requests.length },
        })
      }

      const { UnprocessedItems } = await this.deps.client.batchWriteItem({
        RequestItems: { [this.opts.tableName]: requests },
      })

      requests = UnprocessedItems?.[this.opts.tableName] ?? []
    }
  }

  private async op<T>(op: CacheOp, key: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw BackendError.from(err, { backend: this.kind, op, key })
    }
  }
}
