import { BaseError, type ErrorContext } from "@stash/errors"

type CacheErrorOptions = {
  context?: ErrorContext
  cause?: unknown
}

/**
 * A stored entry could not be turned back into a value. The interceptor
 * serves it as a miss and overwrites it.
 */
export class DecodeError extends BaseError<"decode_failed"> {
  constructor(message: string, options: CacheErrorOptions = {}) {
    super(message, { code: "decode_failed", ...options })
  }
}

/**
 * A call argument has no canonical encoding. Surfaced to the caller.
 */
export class KeyBuildError extends BaseError<"key_build_failed"> {
  constructor(message: string, options: CacheErrorOptions = {}) {
    super(message, { code: "key_build_failed", isOperational: false, ...options })
  }
}

export class ConfigurationError extends BaseError<"configuration_invalid"> {
  constructor(message: string, options: CacheErrorOptions = {}) {
    super(message, { code: "configuration_invalid", isOperational: false, ...options })
  }
}

export class CacheNotInitializedError extends BaseError<"cache_not_initialized"> {
  constructor() {
    super("Cache registry used before init()", {
      code: "cache_not_initialized",
      isOperational: false,
    })
  }
}

export type BackendErrorCode = "backend_unavailable" | "backend_timeout"

export class BackendError extends BaseError<BackendErrorCode> {
  constructor(
    message: string,
    options: CacheErrorOptions & { code?: BackendErrorCode } = {},
  ) {
    const { code = "backend_unavailable", ...rest } = options
    super(message, { code, isRetryable: true, ...rest })
  }

  /** Wraps a client failure, leaving existing BackendErrors untouched. */
  static from(err: unknown, context: ErrorContext): BackendError {
    if (err instanceof BackendError) return err

    const reason = err instanceof Error ? err.message : String(err)

    return new BackendError(`Backend operation failed: ${reason}`, { context, cause: err })
  }
}
