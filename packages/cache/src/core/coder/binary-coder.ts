import { deserialize, serialize } from "node:v8"
import { DecodeError } from "../../errors/cache-errors"
import type { Coder } from "../../ports/coder"
import { ResponseEnvelope } from "./response-envelope"

const VALUE_TAG = 0
const ENVELOPE_TAG = 1

/**
 * V8 structured serialization. Handles what JSON cannot (cycles, typed arrays,
 * RegExp, Error, sparse arrays) but is only readable by Node.js.
 *
 * Class prototypes are not preserved, so the payload is a `[tag, value]` pair
 * and envelopes are rebuilt from their record on the way out.
 */
export class BinaryCoder implements Coder {
  readonly name = "binary"

  encode(value: unknown): Uint8Array {
    const framed =
      value instanceof ResponseEnvelope
        ? [ENVELOPE_TAG, value.toRecord()]
        : [VALUE_TAG, value]

    return new Uint8Array(serialize(framed))
  }

  decode<T = unknown>(bytes: Uint8Array): T {
    let framed

    try {
      framed = deserialize(bytes)
    } catch (err) {
      throw new DecodeError("Payload is not a V8 serialization", {
        context: { coder: this.name, length: bytes.byteLength },
        cause: err,
      })
    }

    if (!Array.isArray(framed) || framed.length !== 2) {
      throw new DecodeError("Payload is missing its value tag", {
        context: { coder: this.name },
      })
    }

    const [tag, value] = framed

    if (tag !== VALUE_TAG && tag !== ENVELOPE_TAG) {
      throw new DecodeError("Payload has an unknown value tag", {
        context: { coder: this.name, tag: String(tag) },
      })
    }

    return tag === ENVELOPE_TAG ? ResponseEnvelope.fromRecord(value) : value
  }
}
