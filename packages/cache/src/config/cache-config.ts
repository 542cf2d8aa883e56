import { type LoggerOptions, logLevelNames } from "@stash/logger"
import { z } from "zod"
import type { CoderName } from "../core/coder/create-coder"
import { DEFAULT_CACHE_STATUS_HEADER, DEFAULT_TTL_SECONDS } from "../core/registry/cache-registry"
import { ConfigurationError } from "../errors/cache-errors"
import type { CacheEvictionPolicy } from "../ports/cache-eviction-policy"
import type { Milliseconds, Seconds } from "../ports/time"
import { LoadedConfig } from "./loaded-config"
import type { ConfigSource } from "./sources/config-source"
import { DotenvSource } from "./sources/dotenv-source"
import { EnvSource } from "./sources/env-source"
import { type ConfigOverrides, ObjectSource } from "./sources/object-source"

const ENV_PREFIXES = ["STASH_", "LOG_"] as const

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)

export const cacheEnvSchema = z.object({
  STASH_ENABLED: z.stringbool().default(true),
  STASH_PREFIX: z.string().default(""),
  STASH_DEFAULT_TTL_SECONDS: positiveInt(DEFAULT_TTL_SECONDS),
  STASH_CODER: z.enum(["json", "binary"]).default("json"),
  STASH_CACHE_STATUS_HEADER: z.string().min(1).default(DEFAULT_CACHE_STATUS_HEADER),

  STASH_BACKEND: z.enum(["memory", "redis", "memcached", "dynamodb"]).default("memory"),

  STASH_MEMORY_MAX_ENTRIES: positiveInt(10_000),
  STASH_MEMORY_EVICTION: z.enum(["lru", "fifo"]).default("lru"),
  STASH_MEMORY_REAP_INTERVAL_MS: z.coerce.number().int().nonnegative().default(0),

  STASH_REDIS_URL: z.url().default("redis://localhost:6379"),
  STASH_REDIS_OP_TIMEOUT_MS: positiveInt(1_000),
  STASH_REDIS_SCAN_COUNT: positiveInt(500),

  STASH_MEMCACHED_SERVERS: z.string().min(1).default("localhost:11211"),

  STASH_DYNAMODB_TABLE: z.string().min(1).default("stash-cache"),
  STASH_DYNAMODB_REGION: z.string().min(1).optional(),
  STASH_DYNAMODB_ENDPOINT: z.url().optional(),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type CacheEnv = z.infer<typeof cacheEnvSchema>
export type CacheEnvName = keyof CacheEnv & string

export type BackendConfig =
  | {
      kind: "memory"
      maxEntries: number
      eviction: CacheEvictionPolicy
      reapIntervalMs: Milliseconds
    }
  | { kind: "redis"; url: string; opTimeoutMs: Milliseconds; scanCount: number }
  | { kind: "memcached"; servers: string }
  | { kind: "dynamodb"; table: string; region?: string | undefined; endpoint?: string | undefined }

export type CacheConfig = {
  enabled: boolean
  prefix: string
  defaultTtl: Seconds
  coder: CoderName
  cacheStatusHeader: string
  backend: BackendConfig
  log: LoggerOptions
}

function toBackendConfig(env: CacheEnv): BackendConfig {
  switch (env.STASH_BACKEND) {
    case "memory":
      return {
        kind: "memory",
        maxEntries: env.STASH_MEMORY_MAX_ENTRIES,
        eviction: env.STASH_MEMORY_EVICTION,
        reapIntervalMs: env.STASH_MEMORY_REAP_INTERVAL_MS,
      }
    case "redis":
      return {
        kind: "redis",
        url: env.STASH_REDIS_URL,
        opTimeoutMs: env.STASH_REDIS_OP_TIMEOUT_MS,
        scanCount: env.STASH_REDIS_SCAN_COUNT,
      }
    case "memcached":
      return { kind: "memcached", servers: env.STASH_MEMCACHED_SERVERS }
    case "dynamodb":
      return {
        kind: "dynamodb",
        table: env.STASH_DYNAMODB_TABLE,
        region: env.STASH_DYNAMODB_REGION,
        endpoint: env.STASH_DYNAMODB_ENDPOINT,
      }
  }
}

export function toCacheConfig(env: CacheEnv): CacheConfig {
  return {
    enabled: env.STASH_ENABLED,
    prefix: env.STASH_PREFIX,
    defaultTtl: env.STASH_DEFAULT_TTL_SECONDS,
    coder: env.STASH_CODER,
    cacheStatusHeader: env.STASH_CACHE_STATUS_HEADER,
    backend: toBackendConfig(env),
    log: { level: env.LOG_LEVEL, prettify: env.LOG_PRETTY },
  }
}

export type LoadCacheConfigOptions = {
  /** Defaults to `process.env`. */
  env?: Record<string, string | undefined>
  overrides?: ConfigOverrides
  /** Optional dotenv file, lowest precedence; missing files are skipped. */
  dotenvFile?: string
  cwd?: string
}

/**
 * Merges dotenv file, environment and overrides (in rising precedence),
 * validates the result and maps it to a {@link CacheConfig}.
 *
 * @throws ConfigurationError listing every invalid setting
 */
export async function loadCacheConfig(
  options: LoadCacheConfigOptions = {},
): Promise<LoadedConfig<CacheConfig, CacheEnvName>> {
  const sources: ConfigSource[] = []

  if (options.dotenvFile) {
    sources.push(new DotenvSource({ file: options.dotenvFile, required: false, cwd: options.cwd }))
  }
  sources.push(new EnvSource({ env: options.env, prefixes: ENV_PREFIXES }))
  if (options.overrides) sources.push(new ObjectSource(options.overrides))

  const merged: Record<string, string> = {}
  const provenance = new Map<string, string>()

  for (const source of sources) {
    for (const [key, value] of Object.entries(await source.load())) {
      if (value === undefined) continue

      merged[key] = value
      provenance.set(key, source.name)
    }
  }

  const result = cacheEnvSchema.safeParse(merged)

  if (!result.success) {
    throw new ConfigurationError(
      `Cache configuration is invalid:\n${z.prettifyError(result.error)}`,
      { cause: result.error },
    )
  }

  const known = new Set(Object.keys(cacheEnvSchema.shape))
  const unknown = Object.keys(merged).filter(
    (key) => key.startsWith("STASH_") && !known.has(key),
  )

  return new LoadedConfig(toCacheConfig(result.data), provenance, unknown)
}
