import {
  type CachedOptions,
  type CacheRegistry,
  cachedResponse,
  type Injected,
  type ResponseEnvelope,
} from "@stash/cache"
import type { Context } from "hono"
import { routePath } from "hono/route"
import type { JSONValue } from "hono/utils/types"
import { HonoExchange } from "./hono-exchange"

export type RouteKey = {
  /** Matched route pattern, e.g. `/users/:id`. */
  route: string
  params: Record<string, string>
  query: Record<string, string[]>
}

export type CachedHandlerOptions = Omit<
  CachedOptions<ResponseEnvelope>,
  "schema" | "receiver" | "injectedDependencyNamespace"
>

export type CachedRouteHandler = (c: Context) => Promise<Response>

type RouteCall = { context: Context } & Injected

const DEFAULT_EXCLUDE = ["request", "response"]

export type RouteHandler = (
  c: Context,
) => JSONValue | Response | Promise<JSONValue | Response>

/**
 * Caches a Hono route. The key covers the matched route pattern, its path
 * parameters and the query string; the context itself is passed through but
 * never keyed. HEAD shares the GET entry. Plain values are rendered with
 * `c.json()` before they are stored.
 *
 * @example
 * ```ts
 * app.get(
 *   "/users/:id",
 *   cachedHandler(registry, { namespace: "users", ttl: 30 }, async function getUser(c) {
 *     return repo.find(c.req.param("id"))
 *   }),
 * )
 * ```
 */
export function cachedHandler(
  registry: CacheRegistry,
  options: CachedHandlerOptions,
  handler: RouteHandler,
): CachedRouteHandler {
  const render = cachedResponse(
    registry,
    {
      ...options,
      exclude: [...(options.exclude ?? DEFAULT_EXCLUDE), "context"],
    },
    async function renderRoute(_key: RouteKey, { context }: RouteCall): Promise<Response> {
      const result = await handler(context)

      return result instanceof Response ? result : context.json(result)
    },
    handler,
  )

  return async function cachedRoute(c: Context): Promise<Response> {
    const exchange = new HonoExchange(c)
    const params: Record<string, string> = c.req.param()

    const response = await render(
      { route: routePath(c), params, query: c.req.queries() },
      { context: c, __stash_request: exchange.request, __stash_response: exchange },
    )

    if (exchange.notModified) {
      return new Response(null, { status: 304, headers: exchange.headers })
    }

    for (const [name, value] of exchange.headers) response.headers.set(name, value)

    return response
  }
}
