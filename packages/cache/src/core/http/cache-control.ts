/**
 * Directive names of a `Cache-Control` header, lowercased, parameters dropped.
 *
 * @example
 * ```ts
 * parseCacheControl("No-Cache, max-age=0") // Set { "no-cache", "max-age" }
 * ```
 */
export function parseCacheControl(header: string | null | undefined): Set<string> {
  const directives = new Set<string>()
  if (!header) return directives

  for (const part of header.split(",")) {
    const name = part.split("=", 1)[0]?.trim().toLowerCase()
    if (name) directives.add(name)
  }

  return directives
}

export function maxAge(seconds: number): string {
  return `max-age=${Math.max(0, Math.ceil(seconds))}`
}
