import { createNullLogger, type Logger } from "@stash/logger"
import { z } from "zod"
import { CacheNotInitializedError, ConfigurationError } from "../../errors/cache-errors"
import type { Backend } from "../../ports/backend"
import type { CacheKey } from "../../ports/cache-key"
import type { Coder } from "../../ports/coder"
import type { Executor } from "../../ports/executor"
import type { KeyBuilder } from "../../ports/key-builder"
import type { Seconds } from "../../ports/time"
import { JsonCoder } from "../coder/json-coder"
import { DeferredExecutor } from "../executor/deferred-executor"
import { DefaultKeyBuilder } from "../key/default-key-builder"
import { encodeKeySegment } from "../key/handler-identity"
import { type Clock, SystemClock } from "../time/clock"

export const DEFAULT_TTL_SECONDS = 60
export const DEFAULT_CACHE_STATUS_HEADER = "X-Stash-Cache"

const HEADER_NAME = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/

const initOptionsSchema = z.object({
  prefix: z.string().default(""),
  enabled: z.boolean().default(true),
  defaultTtl: z.number().int().positive().default(DEFAULT_TTL_SECONDS),
  cacheStatusHeader: z
    .string()
    .regex(HEADER_NAME, "must be a valid HTTP header name")
    .default(DEFAULT_CACHE_STATUS_HEADER),
})

export type CacheInitOptions = {
  backend: Backend
  /** Prepended to every namespace as `"<prefix>:<namespace>"`. */
  prefix?: string
  enabled?: boolean
  defaultTtl?: Seconds
  coder?: Coder
  keyBuilder?: KeyBuilder
  cacheStatusHeader?: string
  clock?: Clock
  executor?: Executor
}

export type RegistryState = Readonly<{
  backend: Backend
  prefix: string
  enabled: boolean
  defaultTtl: Seconds
  coder: Coder
  keyBuilder: KeyBuilder
  cacheStatusHeader: string
  clock: Clock
  executor: Executor
}>

type AnyFunction = (...args: never) => unknown

type HandlerSource = string | AnyFunction

function sourceOf(handler: AnyFunction): HandlerSource {
  const text = Function.prototype.toString.call(handler)

  // bound and native functions all print the same body
  return text.includes("[native code]") ? handler : text
}

export type CacheRegistryDeps = {
  logger?: Logger
}

/**
 * Shared cache context. Construct one per application, hand it to every
 * `cached()` call, and `init()` it once the backend exists. Wrapped handlers
 * read it on every call, so registration may happen before `init()`.
 */
export class CacheRegistry {
  readonly logger: Logger
  private current: RegistryState | undefined
  private readonly claims = new Map<string, HandlerSource>()

  constructor(deps: CacheRegistryDeps = {}) {
    this.logger = deps.logger ?? createNullLogger()
  }

  /** Later calls are ignored until `reset()`. */
  init(options: CacheInitOptions): void {
    if (this.current) {
      this.logger.debug("cache registry already initialized; init ignored")
      return
    }

    const parsed = initOptionsSchema.safeParse({
      prefix: options.prefix,
      enabled: options.enabled,
      defaultTtl: options.defaultTtl,
      cacheStatusHeader: options.cacheStatusHeader,
    })

    if (!parsed.success) {
      throw new ConfigurationError(`Invalid cache options:\n${z.prettifyError(parsed.error)}`, {
        cause: parsed.error,
      })
    }

    this.current = {
      ...parsed.data,
      backend: options.backend,
      coder: options.coder ?? new JsonCoder(),
      keyBuilder: options.keyBuilder ?? new DefaultKeyBuilder(),
      clock: options.clock ?? new SystemClock(),
      executor: options.executor ?? new DeferredExecutor(),
    }

    this.logger.info("cache registry initialized", {
      backend: options.backend.kind,
      prefix: parsed.data.prefix,
      enabled: parsed.data.enabled,
      defaultTtl: parsed.data.defaultTtl,
    })
  }

  /** Drops all state without touching the backend. */
  reset(): void {
    if (!this.current) return

    this.current = undefined
    this.logger.info("cache registry reset")
  }

  /** Closes the backend, then resets. */
  async close(): Promise<void> {
    const state = this.current
    if (!state) return

    this.reset()
    await state.backend.close()
  }

  get isInitialized(): boolean {
    return this.current !== undefined
  }

  get state(): RegistryState {
    if (!this.current) throw new CacheNotInitializedError()

    return this.current
  }

  setEnabled(enabled: boolean): void {
    this.current = { ...this.state, enabled }
    this.logger.info(enabled ? "cache enabled" : "cache disabled")
  }

  /** `"<prefix>:<namespace>"`, each segment escaped so neither can contain `:`. */
  fullNamespace(namespace: string): string {
    return `${encodeKeySegment(this.state.prefix)}:${encodeKeySegment(namespace)}`
  }

  /**
   * Reserves `identity` for `handler` and returns the identity it may key
   * under. Handlers with the same source text count as one, so per-instance
   * closures share entries; a different handler already holding it gets the
   * first free `~<n>` suffix in registration order.
   */
  claimIdentity(identity: string, handler: AnyFunction): string {
    const source = sourceOf(handler)

    for (let n = 1; ; n++) {
      const candidate = n === 1 ? identity : `${identity}~${n}`
      const holder = this.claims.get(candidate)

      if (holder === source) return candidate
      if (holder !== undefined) continue

      this.claims.set(candidate, source)
      if (n > 1) {
        this.logger.warn("cached handler identity already taken; pass `scope` to pin it", {
          identity,
          assigned: candidate,
        })
      }

      return candidate
    }
  }

  /** Removes every entry of `namespace` and reports how many went. */
  async clear(namespace: string): Promise<number> {
    const { backend } = this.state
    const full = this.fullNamespace(namespace)
    const cleared = await backend.clear(full)

    this.logger.info("cache namespace cleared", {
      namespace: full,
      backend: backend.kind,
      op: "clear",
      cleared,
    })

    return cleared
  }

  async clearKey(key: CacheKey): Promise<boolean> {
    const { backend } = this.state
    const deleted = await backend.invalidate(key)

    this.logger.info("cache key invalidated", {
      key,
      backend: backend.kind,
      op: "invalidate",
      deleted,
    })

    return deleted
  }
}
