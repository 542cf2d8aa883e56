export type CacheStatus = "HIT" | "MISS" | "BYPASS" | "NOT_MODIFIED"

export type CacheOp = "get" | "set" | "invalidate" | "clear" | "close"

export type LogContext = {
  service: string
  module: string

  requestId: string
  method: string
  path: string
  status: number

  /** Logical group of cached entries (usually one per endpoint). */
  namespace: string
  /** Fully prefixed backend key. */
  key: string
  cacheStatus: CacheStatus
  /** Backend kind, e.g. "memory" or "redis". */
  backend: string
  op: CacheOp
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields merged into a logger's bindings by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
