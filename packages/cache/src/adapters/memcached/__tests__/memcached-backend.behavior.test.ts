import { BackendError } from "../../../errors/cache-errors"
import { bytes } from "../../../tests/utils/cache-test-helpers"
import { FakeMemcachedClient } from "../../../tests/utils/fake-memcached-client"
import { ManualTestClock } from "../../../tests/utils/manual-test-clock"
import { MemcachedBackend, toMemcachedKey } from "../memcached-backend"

describe("MemcachedBackend", () => {
  let clock: ManualTestClock
  let client: FakeMemcachedClient
  let backend: MemcachedBackend

  beforeEach(() => {
    clock = new ManualTestClock()
    client = new FakeMemcachedClient(clock)
    backend = new MemcachedBackend({ client, clock })
  })

  describe("toMemcachedKey", () => {
    it("keeps short printable keys", () => {
      expect(toMemcachedKey("ns:app:fn:[1]{}")).toBe("ns:app:fn:[1]{}")
    })

    it("hashes keys over 250 bytes", () => {
      const key = `ns:${"x".repeat(300)}`

      expect(toMemcachedKey(key)).toMatch(/^#[0-9a-f]{64}$/)
    })

    it("hashes keys with whitespace or control characters", () => {
      expect(toMemcachedKey("ns:a b")).toMatch(/^#[0-9a-f]{64}$/)
      expect(toMemcachedKey("ns:a\u0001")).toMatch(/^#[0-9a-f]{64}$/)
    })

    it("counts bytes, not characters", () => {
      const key = "é".repeat(126)

      expect(key.length).toBe(126)
      expect(toMemcachedKey(key)).toMatch(/^#/)
    })
  })

  it("round-trips values stored under hashed keys", async () => {
    const key = `ns:${"y".repeat(400)}`

    await backend.set(key, bytes.a(), { ttl: 60 })

    expect(client.writes[0]?.key).toBe(toMemcachedKey(key))
    expect(await backend.get(key)).toStrictEqual({ kind: "hit", value: bytes.a(), meta: {} })
    expect(await backend.clear("ns")).toBe(1)
  })

  it("sends ttls over 30 days as an epoch second", async () => {
    const ttl = 60 * 60 * 24 * 31

    await backend.set("ns:a", bytes.a(), { ttl })
    await backend.set("ns:b", bytes.a(), { ttl: 60 })

    expect(client.writes).toStrictEqual([
      { key: "ns:a", expires: Math.floor(clock.nowMs() / 1000) + ttl },
      { key: "ns:b", expires: 60 },
    ])

    clock.advanceSeconds(ttl - 1)
    expect((await backend.get("ns:a")).kind).toBe("hit")
  })

  it("does not count entries that already expired when clearing", async () => {
    await backend.set("ns:a", bytes.a(), { ttl: 1 })
    await backend.set("ns:b", bytes.a(), { ttl: 60 })
    clock.advanceSeconds(2)

    expect(await backend.clear("ns")).toBe(1)
  })

  it("forgets expired keys on later writes", async () => {
    for (let i = 0; i < 50; i++) {
      await backend.set(`ns:short-${i}`, bytes.a(), { ttl: 1 })
    }
    await backend.set("ns:long", bytes.a(), { ttl: 60 })
    expect(backend.trackedKeys()).toBe(51)

    clock.advanceSeconds(2)
    await backend.set("ns:next", bytes.a(), { ttl: 60 })

    expect(backend.trackedKeys()).toBe(2)
  })

  it("prunes the index when clearing another namespace", async () => {
    await backend.set("a:1", bytes.a(), { ttl: 1 })
    await backend.set("b:1", bytes.a(), { ttl: 60 })
    clock.advanceSeconds(2)

    expect(await backend.clear("b")).toBe(1)
    expect(backend.trackedKeys()).toBe(0)
  })

  it("wraps client failures in a BackendError", async () => {
    client.failure = new Error("ECONNREFUSED")

    await expect(backend.set("ns:a", bytes.a(), { ttl: 1 })).rejects.toBeInstanceOf(BackendError)
    await expect(backend.get("ns:a")).rejects.toMatchObject({
      code: "backend_unavailable",
      context: { backend: "memcached", op: "get", key: "ns:a" },
    })
  })
})
