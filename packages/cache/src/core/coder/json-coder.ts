import SuperJSON from "superjson"
import { DecodeError } from "../../errors/cache-errors"
import type { Coder } from "../../ports/coder"
import { ResponseEnvelope } from "./response-envelope"

type SuperJsonPayload = Parameters<SuperJSON["deserialize"]>[0]

type EnvelopeJson = {
  status: number
  headers: [string, string][]
  body: string
  mediaType: string | null
}

function isSuperJsonPayload(value: unknown): value is SuperJsonPayload {
  return typeof value === "object" && value !== null && "json" in value
}

function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64")
}

function fromBase64(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, "base64"))
}

/**
 * UTF-8 superjson text. Dates, Maps, Sets, bigints and `undefined` survive the
 * round trip; byte arrays and response envelopes are stored as base64.
 */
export class JsonCoder implements Coder {
  readonly name = "json"

  private readonly sj = new SuperJSON()
  private readonly encoder = new TextEncoder()
  private readonly decoder = new TextDecoder("utf-8", { fatal: true })

  constructor() {
    this.sj.registerCustom<Uint8Array, string>(
      {
        isApplicable: (v): v is Uint8Array => v instanceof Uint8Array,
        serialize: toBase64,
        deserialize: fromBase64,
      },
      "stash.bytes",
    )

    this.sj.registerCustom<ResponseEnvelope, EnvelopeJson>(
      {
        isApplicable: (v): v is ResponseEnvelope => v instanceof ResponseEnvelope,
        serialize: (env) => ({
          status: env.status,
          headers: env.headers.map(([name, value]): [string, string] => [name, value]),
          body: toBase64(env.body),
          mediaType: env.mediaType,
        }),
        deserialize: (json) =>
          ResponseEnvelope.fromRecord({ ...json, body: fromBase64(json.body) }),
      },
      "stash.response",
    )
  }

  encode(value: unknown): Uint8Array {
    return this.encoder.encode(this.sj.stringify(value))
  }

  decode<T = unknown>(bytes: Uint8Array): T {
    let parsed: unknown

    try {
      parsed = JSON.parse(this.decoder.decode(bytes))
    } catch (err) {
      throw new DecodeError("Payload is not valid UTF-8 JSON", {
        context: { coder: this.name, length: bytes.byteLength },
        cause: err,
      })
    }

    if (!isSuperJsonPayload(parsed)) {
      throw new DecodeError("Payload is not a superjson document", {
        context: { coder: this.name },
      })
    }

    try {
      return this.sj.deserialize<T>(parsed)
    } catch (err) {
      if (err instanceof DecodeError) throw err

      throw new DecodeError("Payload could not be deserialized", {
        context: { coder: this.name },
        cause: err,
      })
    }
  }
}
