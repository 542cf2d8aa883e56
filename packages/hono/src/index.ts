export {
  cachedHandler,
  type CachedHandlerOptions,
  type CachedRouteHandler,
  type RouteHandler,
  type RouteKey,
} from "./handler/cached-handler"
export { HonoExchange } from "./handler/hono-exchange"
export { createCacheAdminRouter } from "./routes/cache-admin-routes"
export { createCacheErrorHandler, REQUEST_ID_HEADER } from "./errors/create-error-handler"
export {
  CACHE_ERROR_MAPPINGS,
  createErrorFormatter,
  type ErrorFormatter,
  type ErrorMapping,
  type ErrorMappingsConfig,
  type ErrorResponse,
  type ErrorResponseBody,
  type FallbackMapping,
} from "./errors/errors"
