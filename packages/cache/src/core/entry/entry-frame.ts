import { DecodeError } from "../../errors/cache-errors"
import type { Milliseconds, Seconds } from "../../ports/time"

const MAGIC_0 = 0x53 // "S"
const MAGIC_1 = 0x54 // "T"
const VERSION = 1

const FIXED_HEADER = 4
const TIMES_LENGTH = 12

export type EntryFrame = {
  /** Name of the coder that produced `payload`. */
  encoding: string
  storedAtMs: Milliseconds
  ttlSeconds: Seconds
  payload: Uint8Array
}

function isTagByte(byte: number): boolean {
  return byte >= 0x21 && byte <= 0x7e
}

/**
 * Layout: `"ST"`, version, tag length, tag, storedAtMs (float64 BE),
 * ttlSeconds (uint32 BE), payload.
 */
export function encodeEntry(frame: EntryFrame): Uint8Array {
  const tag = new TextEncoder().encode(frame.encoding)

  if (tag.length === 0 || tag.length > 255 || !tag.every(isTagByte)) {
    throw new RangeError(`Invalid encoding tag: ${JSON.stringify(frame.encoding)}`)
  }
  if (!Number.isInteger(frame.ttlSeconds) || frame.ttlSeconds < 0 || frame.ttlSeconds > 0xffffffff) {
    throw new RangeError(`Invalid ttl: ${frame.ttlSeconds}`)
  }

  const headerLength = FIXED_HEADER + tag.length + TIMES_LENGTH
  const out = new Uint8Array(headerLength + frame.payload.length)
  const view = new DataView(out.buffer)

  out[0] = MAGIC_0
  out[1] = MAGIC_1
  out[2] = VERSION
  out[3] = tag.length
  out.set(tag, FIXED_HEADER)

  const timesAt = FIXED_HEADER + tag.length
  view.setFloat64(timesAt, frame.storedAtMs)
  view.setUint32(timesAt + 8, frame.ttlSeconds)

  out.set(frame.payload, headerLength)

  return out
}

export function decodeEntry(bytes: Uint8Array): EntryFrame {
  if (bytes.length < FIXED_HEADER) {
    throw new DecodeError("Entry frame is truncated", { context: { length: bytes.length } })
  }
  if (bytes[0] !== MAGIC_0 || bytes[1] !== MAGIC_1) {
    throw new DecodeError("Entry frame has a bad magic number")
  }
  if (bytes[2] !== VERSION) {
    throw new DecodeError("Entry frame has an unsupported version", {
      context: { version: bytes[2] },
    })
  }

  const tagLength = bytes[3] ?? 0
  const headerLength = FIXED_HEADER + tagLength + TIMES_LENGTH

  if (tagLength === 0 || bytes.length < headerLength) {
    throw new DecodeError("Entry frame is truncated", { context: { length: bytes.length } })
  }

  const tag = bytes.subarray(FIXED_HEADER, FIXED_HEADER + tagLength)

  if (!tag.every(isTagByte)) {
    throw new DecodeError("Entry frame has a non-ASCII encoding tag")
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  const timesAt = FIXED_HEADER + tagLength

  return {
    encoding: new TextDecoder().decode(tag),
    storedAtMs: view.getFloat64(timesAt),
    ttlSeconds: view.getUint32(timesAt + 8),
    payload: bytes.slice(headerLength),
  }
}

export function expiresAtMs(frame: EntryFrame): Milliseconds {
  return frame.storedAtMs + frame.ttlSeconds * 1000
}

/** Milliseconds left before the frame expires; zero or less means expired. */
export function remainingMs(frame: EntryFrame, nowMs: Milliseconds): Milliseconds {
  return expiresAtMs(frame) - nowMs
}
