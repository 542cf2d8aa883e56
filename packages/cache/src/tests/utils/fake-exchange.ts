import type { CacheRequest, CacheResponse } from "../../ports/http-exchange"

export class RecordingResponse implements CacheResponse {
  readonly headers = new Map<string, string>()
  status: number | undefined

  setHeader(name: string, value: string): void {
    this.headers.set(name.toLowerCase(), value)
  }

  setStatus(status: number): void {
    this.status = status
  }

  header(name: string): string | undefined {
    return this.headers.get(name.toLowerCase())
  }
}

export type FakeExchange = {
  deps: { __stash_request: CacheRequest; __stash_response: RecordingResponse }
  response: RecordingResponse
}

/** A request/response pair to pass as a handler's injected named arguments. */
export function fakeExchange(method = "GET", headers: Record<string, string> = {}): FakeExchange {
  const lower = new Map(Object.entries(headers).map(([k, v]) => [k.toLowerCase(), v]))
  const response = new RecordingResponse()

  return {
    deps: {
      __stash_request: { method, header: (name) => lower.get(name.toLowerCase()) },
      __stash_response: response,
    },
    response,
  }
}
