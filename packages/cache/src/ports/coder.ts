/**
 * Turns handler results into bytes and back.
 *
 * @remarks
 * `decode` is typed by the caller, the way `JSON.parse` is: the coder restores
 * what was encoded and does not check it against `T`. Call sites that need a
 * checked value pass a schema to `cached()` instead.
 */
export interface Coder {
  /** Encoding tag written into every entry frame, e.g. `"json"`. */
  readonly name: string

  encode(value: unknown): Uint8Array

  /** Throws `DecodeError` for malformed or truncated input. */
  decode<T = unknown>(bytes: Uint8Array): T
}
