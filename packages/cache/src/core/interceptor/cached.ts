import { types } from "node:util"
import type { CacheStatus, LogMeta } from "@stash/logger"
import { type ZodType, z } from "zod"
import { ConfigurationError, DecodeError } from "../../errors/cache-errors"
import type { CacheResult } from "../../ports/cache-result"
import type { Coder } from "../../ports/coder"
import type { HttpExchange } from "../../ports/http-exchange"
import type { KeyBuilder } from "../../ports/key-builder"
import type { Milliseconds, Seconds } from "../../ports/time"
import { ResponseEnvelope } from "../coder/response-envelope"
import { decodeEntry, encodeEntry, remainingMs } from "../entry/entry-frame"
import { maxAge, parseCacheControl } from "../http/cache-control"
import { ifNoneMatchMatches, weakETag } from "../http/etag"
import { InFlightGroup } from "../in-flight/in-flight-group"
import { resolveHandlerIdentity } from "../key/handler-identity"
import type { CacheRegistry, RegistryState } from "../registry/cache-registry"
import { injectedNames, splitCall } from "./split-call"

export type CachedOptions<T> = {
  /** Logical group, cleared together by `registry.clear(namespace)`. */
  namespace?: string
  /** Seconds. Defaults to the registry's `defaultTtl`. */
  ttl?: Seconds
  coder?: Coder
  keyBuilder?: KeyBuilder
  /** Stable handler name. Defaults to `fn.name`. */
  name?: string
  /**
   * Module id, usually `import.meta.url`. Without one, a second handler
   * registered under a taken name keys as `<name>~2`.
   */
  scope?: string
  /** `ns` in the injected `__<ns>_request` / `__<ns>_response` names. */
  injectedDependencyNamespace?: string
  /** Named arguments passed to the handler but left out of the key. */
  exclude?: readonly string[]
  /** Instance to call the handler on; its class and state join the key. */
  receiver?: object
  /** Key on the call's own `this` when no `receiver` is given. Off by default. */
  keyThis?: boolean
  /** Parses decoded hits, rebuilding class instances and rejecting stale shapes. */
  schema?: ZodType<T>
  /** Share one execution between concurrent misses of the same key. */
  coalesce?: boolean
}

export type CachedFunction<A extends unknown[], R> = (...args: A) => Promise<R>

const optionsSchema = z.object({
  namespace: z.string().default(""),
  ttl: z.number().int().positive().optional(),
  name: z.string().trim().min(1).optional(),
  scope: z.string().optional(),
  injectedDependencyNamespace: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be an identifier")
    .default("stash"),
  exclude: z.array(z.string()).default(["request", "response"]),
  coalesce: z.boolean().default(false),
  keyThis: z.boolean().default(false),
})

type Settings = z.infer<typeof optionsSchema>

function parseOptions(options: CachedOptions<unknown>): Settings {
  const parsed = optionsSchema.safeParse({
    namespace: options.namespace,
    ttl: options.ttl,
    name: options.name,
    scope: options.scope,
    injectedDependencyNamespace: options.injectedDependencyNamespace,
    exclude: options.exclude,
    coalesce: options.coalesce,
    keyThis: options.keyThis,
  })

  if (!parsed.success) {
    throw new ConfigurationError(`Invalid cached() options:\n${z.prettifyError(parsed.error)}`, {
      cause: parsed.error,
    })
  }

  return parsed.data
}

type Hit<T> = {
  value: T
  payload: Uint8Array
  remainingMs: Milliseconds
}

type Computed<T> = {
  value: T
  payload: Uint8Array | undefined
}

const CACHEABLE_METHODS = new Set(["GET", "HEAD"])

function passthroughReason(
  state: RegistryState,
  exchange: HttpExchange,
  directives: ReadonlySet<string>,
): string | undefined {
  if (!state.enabled) return "disabled"
  if (exchange.request && !CACHEABLE_METHODS.has(exchange.request.method.toUpperCase())) {
    return "method"
  }
  if (directives.has("no-store")) return "no-store"

  return undefined
}

/**
 * Wraps `fn` so results are served from, or written to, the registry's
 * backend. The wrapper has `fn`'s parameters and always returns a promise.
 *
 * Per call:
 * - passthrough when the registry is disabled, the injected request is not
 *   GET/HEAD, or it sends `Cache-Control: no-store`;
 * - lookup, skipped for `no-cache`; backend and decode failures count as misses;
 * - on a miss, execute (synchronous bodies through the registry executor) and
 *   store; a failed store is logged and the result still returned;
 * - with an injected response, write the cache-status, `Cache-Control` and
 *   `ETag` headers, and answer a matching `If-None-Match` with 304.
 *
 * @throws ConfigurationError at registration for invalid options or an unnamed `fn`
 * @throws KeyBuildError on a call whose arguments have no canonical form
 * @throws CacheNotInitializedError on a call before `registry.init()`
 */
export function cached<A extends unknown[], R>(
  registry: CacheRegistry,
  options: CachedOptions<NoInfer<Awaited<R>>>,
  fn: (...args: A) => R,
): CachedFunction<A, Awaited<R>> {
  return wrap(registry, options, fn, fn)
}

type Origin = ((...args: never) => unknown) & { name: string }

function wrap<A extends unknown[], R>(
  registry: CacheRegistry,
  options: CachedOptions<NoInfer<Awaited<R>>>,
  fn: (...args: A) => R,
  origin: Origin,
): CachedFunction<A, Awaited<R>> {
  const settings = parseOptions(options)
  const resolved = resolveHandlerIdentity(origin, {
    name: settings.name,
    scope: settings.scope,
    receiver: options.receiver,
  })
  const identity =
    settings.scope === undefined ? registry.claimIdentity(resolved, origin) : resolved
  const runsSync = !types.isAsyncFunction(fn)
  const names = injectedNames(settings.injectedDependencyNamespace)
  const exclude = new Set(settings.exclude)
  const flights = new InFlightGroup<Computed<Awaited<R>>>()
  const { logger } = registry

  return async function cachedCall(this: unknown, ...args: A): Promise<Awaited<R>> {
    const self = options.receiver ?? this
    const receiver =
      options.receiver ??
      (settings.keyThis && typeof this === "object" && this !== null ? this : undefined)
    const { keyArgs, keyKwargs, exchange } = splitCall(args, names, exclude)
    const state = registry.state
    const { backend, clock } = state
    const coder = options.coder ?? state.coder
    const keyBuilder = options.keyBuilder ?? state.keyBuilder
    const ttl = settings.ttl ?? state.defaultTtl
    const namespace = registry.fullNamespace(settings.namespace)

    const execute = async (): Promise<Awaited<R>> => {
      const result = runsSync
        ? await state.executor.run(() => fn.apply(self, args))
        : await fn.apply(self, args)

      if (result instanceof Response) {
        throw new ConfigurationError(
          "cached() cannot store a Response; wrap the handler with cachedResponse()",
          { context: { identity } },
        )
      }

      return result
    }

    const directives = parseCacheControl(exchange.request?.header("cache-control"))
    const reason = passthroughReason(state, exchange, directives)

    if (reason) {
      logger.trace("cache passthrough", { namespace, reason, cacheStatus: "BYPASS" })
      return execute()
    }

    const key = keyBuilder.build({ namespace, identity, receiver, args: keyArgs, kwargs: keyKwargs })
    const startedAt = performance.now()

    const meta = (cacheStatus: CacheStatus, extra: LogMeta = {}): LogMeta => ({
      namespace,
      key,
      cacheStatus,
      backend: backend.kind,
      durationMs: Math.round(performance.now() - startedAt),
      ...extra,
    })

    const decodeValue = (payload: Uint8Array): Awaited<R> => {
      if (!options.schema) return coder.decode<Awaited<R>>(payload)

      const parsed = options.schema.safeParse(coder.decode(payload))
      if (!parsed.success) {
        throw new DecodeError("Cached value does not match the schema", { cause: parsed.error })
      }

      return parsed.data
    }

    const lookup = async (): Promise<Hit<Awaited<R>> | undefined> => {
      let result: CacheResult<Uint8Array>

      try {
        result = await backend.get(key)
      } catch (err) {
        logger.warn("cache lookup failed; treating as miss", meta("MISS", { op: "get", err }))
        return undefined
      }

      if (result.kind === "miss") return undefined

      try {
        const frame = decodeEntry(result.value)

        if (frame.encoding !== coder.name) {
          throw new DecodeError(`Entry was written by the ${frame.encoding} coder`, {
            context: { expected: coder.name },
          })
        }

        const left = remainingMs(frame, clock.nowMs())
        if (left <= 0) return undefined

        return {
          value: decodeValue(frame.payload),
          payload: frame.payload,
          remainingMs: result.meta.ttlMs ?? left,
        }
      } catch (err) {
        logger.warn("cache entry could not be decoded; treating as miss", meta("MISS", { err }))
        return undefined
      }
    }

    const store = async (value: Awaited<R>): Promise<Uint8Array | undefined> => {
      let payload: Uint8Array

      try {
        payload = coder.encode(value)
      } catch (err) {
        logger.warn("cache value could not be encoded; not stored", meta("MISS", { err }))
        return undefined
      }

      try {
        const framed = encodeEntry({
          encoding: coder.name,
          storedAtMs: clock.nowMs(),
          ttlSeconds: ttl,
          payload,
        })
        await backend.set(key, framed, { ttl })
      } catch (err) {
        logger.warn("cache store failed", meta("MISS", { op: "set", err }))
      }

      return payload
    }

    const compute = async (): Promise<Computed<Awaited<R>>> => {
      const value = await execute()
      return { value, payload: await store(value) }
    }

    const hit = directives.has("no-cache") ? undefined : await lookup()

    if (hit) {
      const etag = weakETag(hit.payload)
      const { response } = exchange

      if (response) {
        response.setHeader(state.cacheStatusHeader, "HIT")
        response.setHeader("Cache-Control", maxAge(hit.remainingMs / 1000))
        response.setHeader("ETag", etag)

        if (ifNoneMatchMatches(exchange.request?.header("if-none-match"), etag)) {
          response.setStatus(304)
        }
      }

      logger.debug("cache hit", meta("HIT"))
      return hit.value
    }

    const computed = settings.coalesce ? (await flights.run(key, compute)).value : await compute()

    if (exchange.response) {
      exchange.response.setHeader(state.cacheStatusHeader, "MISS")
      exchange.response.setHeader("Cache-Control", maxAge(ttl))
      if (computed.payload) exchange.response.setHeader("ETag", weakETag(computed.payload))
    }

    logger.debug("cache miss", meta("MISS", { forced: directives.has("no-cache") }))
    return computed.value
  }
}

/**
 * `cached()` for handlers that return a Fetch `Response`. The body is read
 * from a clone into a {@link ResponseEnvelope}; hits are rebuilt into a fresh
 * `Response` with the stored status, headers and body.
 *
 * `origin` names the entries when `fn` is itself an adapter around the
 * user's handler; it defaults to `fn`.
 */
export function cachedResponse<A extends unknown[]>(
  registry: CacheRegistry,
  options: Omit<CachedOptions<ResponseEnvelope>, "schema">,
  fn: (...args: A) => Response | Promise<Response>,
  origin: Origin = fn,
): CachedFunction<A, Response> {
  const runsSync = !types.isAsyncFunction(fn)

  const envelopes = wrap(
    registry,
    { ...options, schema: z.instanceof(ResponseEnvelope) },
    async function readResponse(this: unknown, ...args: A): Promise<ResponseEnvelope> {
      const response = runsSync
        ? await registry.state.executor.run(() => fn.apply(this, args))
        : await fn.apply(this, args)

      return ResponseEnvelope.fromResponse(response)
    },
    origin,
  )

  return async function cachedResponseCall(this: unknown, ...args: A): Promise<Response> {
    const envelope = await envelopes.apply(this, args)
    return envelope.toResponse()
  }
}
