import type { CacheRequest, CacheResponse } from "@stash/cache"
import type { Context } from "hono"

/**
 * Bridges a Hono context to the interceptor. Request data is read from `c.req`;
 * headers and status written by the interceptor are collected here and applied
 * to the outgoing response by {@link cachedHandler}.
 */
export class HonoExchange implements CacheResponse {
  readonly headers = new Headers()
  status: number | undefined

  readonly request: CacheRequest

  constructor(c: Context) {
    this.request = {
      method: c.req.method,
      header: (name) => c.req.header(name),
    }
  }

  setHeader(name: string, value: string): void {
    this.headers.set(name, value)
  }

  setStatus(status: number): void {
    this.status = status
  }

  get notModified(): boolean {
    return this.status === 304
  }
}
