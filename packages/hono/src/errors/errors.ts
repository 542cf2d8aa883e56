import { type AppError, type ErrorCode, isAppError } from "@stash/errors"
import type { ContentfulStatusCode } from "hono/utils/http-status"

export type ErrorMapping = {
  status: ContentfulStatusCode

  /**
   * User-facing error message.
   *
   * @remarks
   * Should not expose keys or backend details.
   */
  message: string
}

export type FallbackMapping = ErrorMapping & {
  code: ErrorCode
}

export type ErrorContextTransformer = (error: AppError) => Record<string, unknown> | undefined

export interface ErrorMappingsConfig {
  /** Unmapped AppErrors keep their code but take the fallback status and message. */
  mappings: Partial<Record<ErrorCode, ErrorMapping>>

  fallback?: FallbackMapping

  /** Return undefined to leave the context out of the body. */
  transformContext?: ErrorContextTransformer
}

export type ErrorResponseBody = {
  status: ContentfulStatusCode
  code: ErrorCode
  message: string
  requestId: string
  [key: string]: unknown
}

export type ErrorResponse = {
  error: ErrorResponseBody
}

export type ErrorFormatter = (error: unknown, requestId: string) => ErrorResponse

const DEFAULT_FALLBACK: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "An unexpected error occurred",
}

export const CACHE_ERROR_MAPPINGS: ErrorMappingsConfig["mappings"] = {
  cache_not_initialized: { status: 503, message: "Cache is not ready" },
  backend_unavailable: { status: 503, message: "Cache backend is unavailable" },
  backend_timeout: { status: 503, message: "Cache backend timed out" },
  key_build_failed: { status: 500, message: "Request could not be cached" },
  configuration_invalid: { status: 500, message: "Cache is misconfigured" },
}

export function createErrorFormatter(config: ErrorMappingsConfig): ErrorFormatter {
  const fallback = config.fallback ?? DEFAULT_FALLBACK

  return (error, requestId) => {
    if (!isAppError(error)) {
      return {
        error: {
          code: fallback.code,
          status: fallback.status,
          message: fallback.message,
          requestId,
        },
      }
    }

    const mapping = config.mappings[error.code]
    const extra = extractExtraContext(config, error)

    return {
      error: {
        ...extra,
        code: error.code,
        status: mapping?.status ?? fallback.status,
        message: mapping?.message ?? fallback.message,
        requestId,
      },
    }
  }
}

function extractExtraContext(
  config: ErrorMappingsConfig,
  error: AppError,
): Record<string, unknown> | undefined {
  try {
    return config.transformContext?.(error) ?? {}
  } catch {
    return undefined
  }
}
