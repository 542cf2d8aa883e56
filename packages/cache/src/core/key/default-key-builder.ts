import { createHash } from "node:crypto"
import type { KeyBuilder, KeyBuildInput } from "../../ports/key-builder"
import { canonicalize, canonicalizeReceiver } from "./canonical"

export const MAX_INLINE_ARGS_LENGTH = 128

const INLINE_SAFE = /^[\x21-\x7e]*$/

/**
 * Builds `"<namespace>:<identity>:<args>"`.
 *
 * `<args>` is the canonical encoding of receiver, positional and named
 * arguments when it is short printable ASCII, otherwise `"#"` followed by its
 * SHA-256.
 */
export class DefaultKeyBuilder implements KeyBuilder {
  constructor(private readonly maxInlineLength: number = MAX_INLINE_ARGS_LENGTH) {}

  build(input: KeyBuildInput): string {
    const parts: string[] = []

    if (input.receiver !== undefined) parts.push(`${canonicalizeReceiver(input.receiver)}.`)

    parts.push(canonicalize(input.args, "args"))
    parts.push(canonicalize(input.kwargs, "kwargs"))

    const canonical = parts.join("")

    return `${input.namespace}:${input.identity}:${this.compact(canonical)}`
  }

  private compact(canonical: string): string {
    if (canonical.length <= this.maxInlineLength && INLINE_SAFE.test(canonical)) {
      return canonical
    }

    return `#${createHash("sha256").update(canonical, "utf8").digest("hex")}`
  }
}
