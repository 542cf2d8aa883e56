import { z } from "zod"
import { DecodeError } from "../../errors/cache-errors"

export type ResponseEnvelopeRecord = {
  status: number
  headers: [string, string][]
  body: Uint8Array
  mediaType: string | null
}

export const responseEnvelopeRecordSchema = z.object({
  status: z.number().int().min(100).max(599),
  headers: z.array(z.tuple([z.string(), z.string()])),
  body: z.instanceof(Uint8Array),
  mediaType: z.string().nullable(),
})

const NULL_BODY_STATUSES = new Set([101, 103, 204, 205, 304])

/**
 * A handler's HTTP response, detached from the stream it was read from so it
 * can be encoded, stored, and replayed.
 */
export class ResponseEnvelope {
  readonly status: number
  readonly headers: readonly (readonly [string, string])[]
  readonly body: Uint8Array
  readonly mediaType: string | null

  constructor(record: ResponseEnvelopeRecord) {
    this.status = record.status
    this.headers = record.headers.map(([name, value]) => [name, value] as const)
    this.body = record.body
    this.mediaType = record.mediaType
  }

  /** Reads a clone, so the original response stays consumable. */
  static async fromResponse(response: Response): Promise<ResponseEnvelope> {
    const copy = response.clone()
    const body = new Uint8Array(await copy.arrayBuffer())

    return new ResponseEnvelope({
      status: copy.status,
      headers: [...copy.headers],
      body,
      mediaType: copy.headers.get("content-type"),
    })
  }

  static fromRecord(value: unknown): ResponseEnvelope {
    const parsed = responseEnvelopeRecordSchema.safeParse(value)

    if (!parsed.success) {
      throw new DecodeError("Stored response envelope is malformed", {
        context: { issues: parsed.error.issues.length },
        cause: parsed.error,
      })
    }

    return new ResponseEnvelope(parsed.data)
  }

  toRecord(): ResponseEnvelopeRecord {
    return {
      status: this.status,
      headers: this.headers.map(([name, value]): [string, string] => [name, value]),
      body: this.body,
      mediaType: this.mediaType,
    }
  }

  /** `extraHeaders` replace stored headers of the same name. */
  toResponse(extraHeaders: Iterable<readonly [string, string]> = []): Response {
    const headers = new Headers()

    for (const [name, value] of this.headers) headers.append(name, value)
    for (const [name, value] of extraHeaders) headers.set(name, value)

    if (this.mediaType !== null && !headers.has("content-type")) {
      headers.set("content-type", this.mediaType)
    }

    const body = NULL_BODY_STATUSES.has(this.status) ? null : this.body

    return new Response(body, { status: this.status, headers })
  }
}
