import { ConfigurationError } from "../../errors/cache-errors"

export const DEFAULT_SCOPE = "anonymous"

const IDENTITY_CHAR = /^[\w.~:/@$-]$/u
const SEGMENT_CHAR = /^[\w.~/@$-]$/u

function percentEncode(text: string, safe: RegExp): string {
  let out = ""

  for (const ch of text) {
    if (safe.test(ch)) {
      out += ch
      continue
    }

    for (const byte of new TextEncoder().encode(ch)) {
      out += `%${byte.toString(16).toUpperCase().padStart(2, "0")}`
    }
  }

  return out
}

/**
 * Percent-encodes one `:`-separated key segment, `:` included, so a
 * namespace such as `"a:b"` never shares a prefix with `"a"`.
 */
export function encodeKeySegment(text: string): string {
  return percentEncode(text, SEGMENT_CHAR)
}

export type IdentityOptions = {
  name?: string | undefined
  scope?: string | undefined
  receiver?: object | undefined
}

/**
 * `"<scope>:<qualifiedName>"`, percent-encoded outside a small safe set.
 * Resolved once per cached function.
 */
export function resolveHandlerIdentity(fn: { name: string }, options: IdentityOptions): string {
  const name = (options.name ?? fn.name).trim()

  if (name === "") {
    throw new ConfigurationError(
      "Cached function has no name; pass `name` so its cache key is stable",
    )
  }

  const owner = options.receiver?.constructor.name
  const qualifiedName = owner ? `${owner}.${name}` : name
  const scope = options.scope?.trim() || DEFAULT_SCOPE

  return percentEncode(`${scope}:${qualifiedName}`, IDENTITY_CHAR)
}
