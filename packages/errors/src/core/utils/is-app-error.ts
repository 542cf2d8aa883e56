import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Type guard for {@link AppError}. Structural, so errors thrown by another
 * copy of this package (or hand-built error objects) are recognised too.
 *
 * @example
 * ```ts
 * catch (err) {
 *   if (isAppError(err) && err.code === "cache_not_initialized") {
 *     return c.json({ error: err.code }, 503)
 *   }
 *   throw err
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
