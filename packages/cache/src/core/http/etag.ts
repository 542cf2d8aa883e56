import { createHash } from "node:crypto"

export function weakETag(payload: Uint8Array): string {
  return `W/"${createHash("sha1").update(payload).digest("hex")}"`
}

function opaqueTag(tag: string): string {
  const trimmed = tag.trim()

  return trimmed.startsWith("W/") ? trimmed.slice(2) : trimmed
}

/**
 * Weak comparison (RFC 9110 §13.1.2): `*` matches anything, weak and strong
 * forms of the same opaque tag match each other.
 */
export function ifNoneMatchMatches(header: string | null | undefined, etag: string): boolean {
  if (!header) return false
  if (header.trim() === "*") return true

  const wanted = opaqueTag(etag)

  return header.split(",").some((candidate) => opaqueTag(candidate) === wanted)
}
