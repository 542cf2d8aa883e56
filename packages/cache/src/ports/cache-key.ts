/**
 * Fully qualified backend key: `"<prefix>:<namespace>:<identity>:<args>"`.
 *
 * Backends treat keys as opaque strings. The only structure they rely on is
 * the namespace prefix, for `clear(namespace)`.
 */
export type CacheKey = string
