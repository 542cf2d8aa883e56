import { createPinoLogger, type Logger, type PinoLoggerDeps } from "@stash/logger"
import { createBackend, type CreateBackendDeps } from "../adapters/create-backend"
import { createCoder } from "../core/coder/create-coder"
import { CacheRegistry } from "../core/registry/cache-registry"
import { type Clock, SystemClock } from "../core/time/clock"
import type { Executor } from "../ports/executor"
import type { CacheConfig } from "./cache-config"

export type InitFromConfigDeps = {
  clock?: Clock
  executor?: Executor
  clients?: CreateBackendDeps["clients"]
}

/** Creates the configured backend and coder, then initializes `registry`. */
export async function initCacheFromConfig(
  registry: CacheRegistry,
  config: CacheConfig,
  deps: InitFromConfigDeps = {},
): Promise<void> {
  if (registry.isInitialized) {
    registry.logger.debug("cache registry already initialized; config ignored")
    return
  }

  const clock = deps.clock ?? new SystemClock()
  const backend = await createBackend(config.backend, {
    clock,
    logger: registry.logger,
    clients: deps.clients,
  })

  registry.init({
    backend,
    prefix: config.prefix,
    enabled: config.enabled,
    defaultTtl: config.defaultTtl,
    coder: createCoder(config.coder),
    cacheStatusHeader: config.cacheStatusHeader,
    clock,
    executor: deps.executor,
  })
}

export type RegistryFromConfigDeps = InitFromConfigDeps & {
  /** Where log lines go instead of stdout. */
  destination?: PinoLoggerDeps["destination"]
}

/** A pino logger at the configured level, bound to the cache module. */
export function createCacheLogger(
  config: CacheConfig,
  destination?: PinoLoggerDeps["destination"],
): Logger {
  return createPinoLogger({ destination }, config.log, { module: "cache" })
}

/** A registry that logs through {@link createCacheLogger}, initialized from `config`. */
export async function createRegistryFromConfig(
  config: CacheConfig,
  deps: RegistryFromConfigDeps = {},
): Promise<CacheRegistry> {
  const { destination, ...init } = deps
  const registry = new CacheRegistry({ logger: createCacheLogger(config, destination) })

  await initCacheFromConfig(registry, config, init)

  return registry
}
