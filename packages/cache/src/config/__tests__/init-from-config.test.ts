import { Writable } from "node:stream"
import { CacheRegistry } from "../../core/registry/cache-registry"
import { FakeRedisClient } from "../../tests/utils/fake-redis-client"
import { ManualTestClock } from "../../tests/utils/manual-test-clock"
import { RecordingLogger } from "../../tests/utils/recording-logger"
import { loadCacheConfig } from "../cache-config"
import { createRegistryFromConfig, initCacheFromConfig } from "../init-from-config"

function captureLines() {
  const lines: Record<string, unknown>[] = []
  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(JSON.parse(chunk.toString("utf8")))
      callback()
    },
  })

  return { lines, destination }
}

describe("initCacheFromConfig", () => {
  it("initializes the registry with the configured backend and coder", async () => {
    const clock = new ManualTestClock()
    const redis = new FakeRedisClient(clock)
    redis.isOpen = false
    const registry = new CacheRegistry({ logger: new RecordingLogger() })
    const { value } = await loadCacheConfig({
      env: {
        STASH_BACKEND: "redis",
        STASH_PREFIX: "api",
        STASH_CODER: "binary",
        STASH_DEFAULT_TTL_SECONDS: "120",
      },
    })

    await initCacheFromConfig(registry, value, { clock, clients: { redis: () => redis } })

    const { state } = registry
    expect(redis.isOpen).toBe(true)
    expect(state.backend.kind).toBe("redis")
    expect(state.coder.name).toBe("binary")
    expect(state.prefix).toBe("api")
    expect(state.defaultTtl).toBe(120)
    expect(state.clock).toBe(clock)
  })

  it("leaves an initialized registry alone", async () => {
    const logger = new RecordingLogger()
    const registry = new CacheRegistry({ logger })
    const memory = await loadCacheConfig({ env: {} })
    const prefixed = await loadCacheConfig({ env: { STASH_PREFIX: "second" } })

    await initCacheFromConfig(registry, memory.value)
    await initCacheFromConfig(registry, prefixed.value)

    expect(registry.state.prefix).toBe("")
    expect(logger.messages("debug")).toContain("cache registry already initialized; config ignored")

    await registry.close()
  })

  describe("createRegistryFromConfig", () => {
    it("logs through pino at the configured level", async () => {
      const { lines, destination } = captureLines()
      const { value } = await loadCacheConfig({ env: { STASH_PREFIX: "api", LOG_LEVEL: "info" } })

      const registry = await createRegistryFromConfig(value, { destination })

      expect(registry.state.prefix).toBe("api")
      expect(lines).toHaveLength(1)
      expect(lines[0]).toMatchObject({
        level: 30,
        msg: "cache registry initialized",
        module: "cache",
        backend: "memory",
        prefix: "api",
      })

      await registry.close()
    })

    it("drops entries below LOG_LEVEL", async () => {
      const { lines, destination } = captureLines()
      const { value } = await loadCacheConfig({ env: { LOG_LEVEL: "warn" } })

      const registry = await createRegistryFromConfig(value, { destination })

      expect(registry.isInitialized).toBe(true)
      expect(lines).toStrictEqual([])

      await registry.close()
    })
  })
})
