import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import path from "node:path"
import { ConfigurationError } from "../../errors/cache-errors"
import { loadCacheConfig } from "../cache-config"

describe("loadCacheConfig", () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "stash-config-"))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it("fills every setting from defaults", async () => {
    const loaded = await loadCacheConfig({ env: {} })

    expect(loaded.value).toStrictEqual({
      enabled: true,
      prefix: "",
      defaultTtl: 60,
      coder: "json",
      cacheStatusHeader: "X-Stash-Cache",
      backend: { kind: "memory", maxEntries: 10_000, eviction: "lru", reapIntervalMs: 0 },
      log: { level: "info", prettify: false },
    })
    expect(loaded.explain("STASH_PREFIX")).toBe("default")
    expect(loaded.sourcesUsed()).toStrictEqual([])
    expect(Object.isFrozen(loaded.value)).toBe(true)
  })

  it("layers dotenv, env and overrides in rising precedence", async () => {
    await writeFile(
      path.join(dir, ".env.test"),
      "STASH_PREFIX=from-file\nSTASH_DEFAULT_TTL_SECONDS=30\nSTASH_CODER=binary\n",
    )

    const loaded = await loadCacheConfig({
      dotenvFile: ".env.test",
      cwd: dir,
      env: { STASH_PREFIX: "from-env", STASH_CODER: "json" },
      overrides: { STASH_PREFIX: "from-code" },
    })

    expect(loaded.value.prefix).toBe("from-code")
    expect(loaded.value.defaultTtl).toBe(30)
    expect(loaded.value.coder).toBe("json")
    expect(loaded.explain("STASH_PREFIX")).toBe("overrides")
    expect(loaded.explain("STASH_DEFAULT_TTL_SECONDS")).toBe("dotenv:.env.test")
    expect(loaded.explain("STASH_CODER")).toBe("env")
    expect(loaded.sourcesUsed().sort()).toStrictEqual(["dotenv:.env.test", "env", "overrides"])
  })

  it("skips a missing dotenv file", async () => {
    const loaded = await loadCacheConfig({ dotenvFile: "absent.env", cwd: dir, env: {} })

    expect(loaded.value.prefix).toBe("")
  })

  it("coerces booleans and numbers from strings and overrides", async () => {
    const loaded = await loadCacheConfig({
      env: { STASH_ENABLED: "off", LOG_PRETTY: "yes", LOG_LEVEL: "debug" },
      overrides: { STASH_DEFAULT_TTL_SECONDS: 15 },
    })

    expect(loaded.value.enabled).toBe(false)
    expect(loaded.value.defaultTtl).toBe(15)
    expect(loaded.value.log).toStrictEqual({ level: "debug", prettify: true })
  })

  it.each([
    [
      "redis",
      { STASH_BACKEND: "redis", STASH_REDIS_URL: "redis://cache:6380", STASH_REDIS_SCAN_COUNT: "50" },
      { kind: "redis", url: "redis://cache:6380", opTimeoutMs: 1_000, scanCount: 50 },
    ],
    [
      "memcached",
      { STASH_BACKEND: "memcached", STASH_MEMCACHED_SERVERS: "a:11211,b:11211" },
      { kind: "memcached", servers: "a:11211,b:11211" },
    ],
    [
      "dynamodb",
      { STASH_BACKEND: "dynamodb", STASH_DYNAMODB_REGION: "eu-west-1" },
      { kind: "dynamodb", table: "stash-cache", region: "eu-west-1", endpoint: undefined },
    ],
    [
      "fifo memory",
      { STASH_MEMORY_EVICTION: "fifo", STASH_MEMORY_MAX_ENTRIES: "10" },
      { kind: "memory", maxEntries: 10, eviction: "fifo", reapIntervalMs: 0 },
    ],
  ])("maps the %s backend settings", async (_label, env, backend) => {
    const loaded = await loadCacheConfig({ env })

    expect(loaded.value.backend).toStrictEqual(backend)
  })

  it("reports every invalid setting at once", async () => {
    const attempt = loadCacheConfig({
      env: { STASH_DEFAULT_TTL_SECONDS: "0", STASH_BACKEND: "mongo" },
    })

    await expect(attempt).rejects.toBeInstanceOf(ConfigurationError)
    await expect(attempt).rejects.toThrow(/STASH_DEFAULT_TTL_SECONDS[\s\S]*STASH_BACKEND|STASH_BACKEND[\s\S]*STASH_DEFAULT_TTL_SECONDS/)
  })

  it("lists unrecognised STASH_ variables", async () => {
    const loaded = await loadCacheConfig({
      env: { STASH_TTL: "5", STASH_PREFIX: "api", HOME: "/root", LOG_FORMAT: "json" },
    })

    expect(loaded.unknownKeys()).toStrictEqual(["STASH_TTL"])
  })
})
