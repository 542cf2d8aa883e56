// Registry and interceptor
export {
  type CacheInitOptions,
  CacheRegistry,
  type CacheRegistryDeps,
  DEFAULT_CACHE_STATUS_HEADER,
  DEFAULT_TTL_SECONDS,
  type RegistryState,
} from "./core/registry/cache-registry"
export {
  cached,
  type CachedFunction,
  type CachedOptions,
  cachedResponse,
} from "./core/interceptor/cached"

// Coders
export { BinaryCoder } from "./core/coder/binary-coder"
export { type CoderName, createCoder } from "./core/coder/create-coder"
export { JsonCoder } from "./core/coder/json-coder"
export { ResponseEnvelope, type ResponseEnvelopeRecord } from "./core/coder/response-envelope"

// Keys
export { canonicalize, canonicalizeReceiver } from "./core/key/canonical"
export { encodeKeySegment } from "./core/key/handler-identity"
export { DefaultKeyBuilder, MAX_INLINE_ARGS_LENGTH } from "./core/key/default-key-builder"

// HTTP helpers
export { maxAge, parseCacheControl } from "./core/http/cache-control"
export { ifNoneMatchMatches, weakETag } from "./core/http/etag"

// Execution and time
export { DeferredExecutor, InlineExecutor } from "./core/executor/deferred-executor"
export { type Clock, SystemClock } from "./core/time/clock"

// Backends
export { createBackend, type CreateBackendDeps } from "./adapters/create-backend"
export {
  type DynamoDbBackendDeps,
  type DynamoDbBackendOptions,
  DynamoDbBackend,
} from "./adapters/dynamodb/dynamodb-backend"
export {
  createDynamoDbClient,
  createDynamoDbTableClient,
  type DynamoDbClientOptions,
  type DynamoDbTableClient,
} from "./adapters/dynamodb/dynamodb-table-client"
export { MemcachedBackend, type MemcachedBackendDeps } from "./adapters/memcached/memcached-backend"
export {
  createMemcachedClient,
  type MemcachedClient,
  type MemcachedClientOptions,
} from "./adapters/memcached/memcached-client"
export {
  MemoryBackend,
  type MemoryBackendDeps,
  type MemoryBackendOptions,
} from "./adapters/memory/memory-backend"
export { RedisBackend, type RedisBackendOptions } from "./adapters/redis/redis-backend"
export {
  createRedisBytesClient,
  type RedisBytesClient,
  type RedisClientOptions,
} from "./adapters/redis/redis-client"
export { FifoMemoryMap } from "./core/eviction/fifo-memory-map"
export { LruMemoryMap } from "./core/eviction/lru-memory-map"

// Configuration
export {
  type BackendConfig,
  type CacheConfig,
  type CacheEnvName,
  cacheEnvSchema,
  loadCacheConfig,
  type LoadCacheConfigOptions,
} from "./config/cache-config"
export {
  createCacheLogger,
  createRegistryFromConfig,
  initCacheFromConfig,
  type InitFromConfigDeps,
  type RegistryFromConfigDeps,
} from "./config/init-from-config"
export type { LoadedConfig } from "./config/loaded-config"

// Errors
export {
  BackendError,
  type BackendErrorCode,
  CacheNotInitializedError,
  ConfigurationError,
  DecodeError,
  KeyBuildError,
} from "./errors/cache-errors"

// Ports
export type { Backend, BackendSetOptions } from "./ports/backend"
export type { CacheEvictionPolicy } from "./ports/cache-eviction-policy"
export type { CacheKey } from "./ports/cache-key"
export type { CacheHit, CacheHitMeta, CacheMiss, CacheResult } from "./ports/cache-result"
export type { Coder } from "./ports/coder"
export type { Executor } from "./ports/executor"
export type { CacheRequest, CacheResponse, HttpExchange, Injected } from "./ports/http-exchange"
export type { KeyBuilder, KeyBuildInput } from "./ports/key-builder"
export type { Milliseconds, Seconds } from "./ports/time"
