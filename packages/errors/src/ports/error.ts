export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (keys, namespaces, backend names).
 * Carried alongside the message instead of being interpolated into it.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lowercase code used for programmatic handling and HTTP mapping. */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when repeating the same operation may succeed (e.g. a dropped connection). */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (a backend timeout, a corrupt entry),
   * `false` for programmer or configuration errors (an unencodable key argument,
   * using the cache before it was initialized).
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used in logs and HTTP error bodies.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
