/**
 * Read side of the request, injected as `__<ns>_request`.
 */
export interface CacheRequest {
  readonly method: string
  header(name: string): string | undefined
}

/**
 * Write side of the response, injected as `__<ns>_response`.
 */
export interface CacheResponse {
  setHeader(name: string, value: string): void
  setStatus(status: number): void
}

export type HttpExchange = {
  request?: CacheRequest | undefined
  response?: CacheResponse | undefined
}

/**
 * Named-argument shape for handlers that accept the injected exchange.
 *
 * @example
 * ```ts
 * const getItem = cached(
 *   registry,
 *   { namespace: "items" },
 *   async function getItem(id: string, _deps: Injected = {}) {
 *     return repo.find(id)
 *   },
 * )
 * ```
 */
export type Injected<Ns extends string = "stash"> = {
  [K in `__${Ns}_request`]?: CacheRequest
} & {
  [K in `__${Ns}_response`]?: CacheResponse
}
