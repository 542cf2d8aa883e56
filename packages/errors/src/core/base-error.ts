import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"
import { isAppError } from "./utils/is-app-error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any thrown value to a {@link SerializedError}.
 *
 * Anything passing {@link isAppError} keeps its code, context and flags.
 * Other `Error`s become non-operational `"unknown"` errors, and non-errors are
 * wrapped with the thrown value in `context.value`.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isOperational: false,
      timestamp: new Date().toISOString(),
    }
  }

  const app = isAppError(err) ? err : undefined

  return {
    name: err.name,
    code: app?.code ?? "unknown",
    message: err.message,
    context: { ...app?.context },
    isOperational: app?.isOperational ?? false,
    timestamp: (app?.timestamp ?? new Date()).toISOString(),
    ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
    ...(options.includeStack && err.stack && { stack: err.stack }),
  }
}
