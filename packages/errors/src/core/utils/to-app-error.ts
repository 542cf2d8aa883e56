import type { AppError, ErrorCode } from "../../ports/error"
import { BaseError } from "../base-error"
import { isAppError } from "./is-app-error"

/**
 * Convert any thrown value to an {@link AppError}.
 *
 * AppErrors pass through unchanged. Anything else is wrapped with
 * `isOperational: false`, since an unclassified failure is assumed to be a bug.
 */
export function toAppError(err: unknown, fallbackCode: ErrorCode = "unknown"): AppError {
  if (isAppError(err)) return err

  if (err instanceof Error) {
    return new BaseError(err.message, {
      code: fallbackCode,
      cause: err,
      isOperational: false,
    })
  }

  return new BaseError(typeof err === "string" ? err : "Unknown error", {
    code: fallbackCode,
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
  })
}
