import { DecodeError } from "../../../errors/cache-errors"
import { decodeEntry, encodeEntry, expiresAtMs, remainingMs } from "../entry-frame"

describe("entry frame", () => {
  const frame = {
    encoding: "json",
    storedAtMs: 1_704_067_200_000,
    ttlSeconds: 60,
    payload: new Uint8Array([7, 8, 9]),
  }

  it("lays out magic, version, tag, times and payload", () => {
    const bytes = encodeEntry(frame)

    expect([...bytes.subarray(0, 8)]).toStrictEqual([0x53, 0x54, 1, 4, 0x6a, 0x73, 0x6f, 0x6e])
    expect(bytes.length).toBe(4 + 4 + 12 + 3)
    expect([...bytes.subarray(-3)]).toStrictEqual([7, 8, 9])

    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    expect(view.getFloat64(8)).toBe(frame.storedAtMs)
    expect(view.getUint32(16)).toBe(60)
  })

  it("decodes what it encodes", () => {
    expect(decodeEntry(encodeEntry(frame))).toStrictEqual(frame)
  })

  it("decodes frames that sit inside a larger buffer", () => {
    const encoded = encodeEntry(frame)
    const outer = new Uint8Array(encoded.length + 5)
    outer.set(encoded, 5)

    expect(decodeEntry(outer.subarray(5))).toStrictEqual(frame)
  })

  it("rejects tags outside printable ASCII and out-of-range ttls", () => {
    expect(() => encodeEntry({ ...frame, encoding: "" })).toThrow(RangeError)
    expect(() => encodeEntry({ ...frame, encoding: "js on" })).toThrow(RangeError)
    expect(() => encodeEntry({ ...frame, encoding: "jsön" })).toThrow(RangeError)
    expect(() => encodeEntry({ ...frame, ttlSeconds: 1.5 })).toThrow(RangeError)
    expect(() => encodeEntry({ ...frame, ttlSeconds: -1 })).toThrow(RangeError)
  })

  describe("decodeEntry failures", () => {
    const valid = () => encodeEntry(frame)

    it.each([
      ["empty input", new Uint8Array()],
      ["a bad magic number", Uint8Array.from([0x58, ...valid().subarray(1)])],
      ["an unknown version", Uint8Array.from([0x53, 0x54, 2, ...valid().subarray(3)])],
      ["a truncated header", valid().subarray(0, 10)],
      ["a zero-length tag", Uint8Array.from([0x53, 0x54, 1, 0, ...new Uint8Array(12)])],
      ["a non-ASCII tag", Uint8Array.from([0x53, 0x54, 1, 1, 0xc3, ...new Uint8Array(12)])],
    ])("raises DecodeError for %s", (_label, bytes) => {
      expect(() => decodeEntry(bytes)).toThrow(DecodeError)
    })
  })

  it("computes expiry from storedAt and ttl", () => {
    expect(expiresAtMs(frame)).toBe(1_704_067_260_000)
    expect(remainingMs(frame, 1_704_067_230_000)).toBe(30_000)
    expect(remainingMs(frame, 1_704_067_260_000)).toBe(0)
  })
})
