import type { ErrorCode } from "@stash/errors"
import type { Logger } from "@stash/logger"
import type { ErrorHandler } from "hono"
import { routePath } from "hono/route"
import {
  CACHE_ERROR_MAPPINGS,
  createErrorFormatter,
  type ErrorMappingsConfig,
} from "./errors"

export const REQUEST_ID_HEADER = "x-request-id"

/**
 * `app.onError()` handler for cache failures. `mappings` are merged over
 * {@link CACHE_ERROR_MAPPINGS}.
 */
export function createCacheErrorHandler(
  logger: Logger,
  config: Partial<ErrorMappingsConfig> = {},
): ErrorHandler {
  const formatter = createErrorFormatter({
    ...config,
    mappings: { ...CACHE_ERROR_MAPPINGS, ...config.mappings },
  })

  return (err, c) => {
    const requestId = c.req.header(REQUEST_ID_HEADER) ?? "unknown"
    const response = formatter(err, requestId)
    const route = routePath(c) || c.req.path

    logError(logger, err, {
      requestId,
      method: c.req.method,
      path: route,
      status: response.error.status,
      code: response.error.code,
    })

    return c.json(response, response.error.status)
  }
}

type ErrorLogMeta = {
  requestId: string
  method: string
  path: string
  status: number
  code: ErrorCode
}

/**
 * - 5xx => error with `err`
 * - 4xx => info without `err`, debug with `err`
 */
function logError(logger: Logger, err: unknown, meta: ErrorLogMeta): void {
  if (meta.status >= 500) {
    logger.error("Request failed", { ...meta, err })
    return
  }

  logger.info("Request failed", meta)
  logger.debug("Request failed details", { ...meta, err })
}
