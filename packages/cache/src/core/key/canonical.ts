import { KeyBuildError } from "../../errors/cache-errors"

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false

  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return "toJSON" in value && typeof value.toJSON === "function"
}

function encodeNumber(n: number): string {
  if (Number.isNaN(n)) return "NaN"
  if (n === Number.POSITIVE_INFINITY) return "Infinity"
  if (n === Number.NEGATIVE_INFINITY) return "-Infinity"
  if (Object.is(n, -0)) return "0"

  return String(n)
}

function byCanonical(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

class CanonicalEncoder {
  private readonly stack = new Set<object>()

  encode(value: unknown, path: string): string {
    switch (typeof value) {
      case "undefined":
        return "undefined"
      case "boolean":
        return value ? "true" : "false"
      case "number":
        return encodeNumber(value)
      case "bigint":
        return `${value}n`
      case "string":
        return JSON.stringify(value)
      case "function":
      case "symbol":
        throw new KeyBuildError(`Cannot build a cache key from a ${typeof value}`, {
          context: { path },
        })
    }

    if (typeof value !== "object" || value === null) return "null"

    return this.encodeObject(value, path)
  }

  private encodeObject(value: object, path: string): string {
    if (this.stack.has(value)) {
      throw new KeyBuildError("Cannot build a cache key from a cyclic structure", {
        context: { path },
      })
    }

    this.stack.add(value)

    try {
      return this.encodeStructured(value, path)
    } finally {
      this.stack.delete(value)
    }
  }

  private encodeStructured(value: object, path: string): string {
    if (value instanceof Date) {
      if (Number.isNaN(value.getTime())) {
        throw new KeyBuildError("Cannot build a cache key from an invalid Date", {
          context: { path },
        })
      }
      return `Date(${value.toISOString()})`
    }

    if (value instanceof Uint8Array) {
      const b64 = Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("base64")
      return `Bytes(${b64})`
    }

    if (Array.isArray(value)) {
      return `[${value.map((item, i) => this.encode(item, `${path}[${i}]`)).join(",")}]`
    }

    if (value instanceof Map) {
      const entries = [...value].map(([k, v]) => {
        const key = this.encode(k, `${path}<key>`)
        return [key, this.encode(v, `${path}[${key}]`)] as const
      })
      entries.sort(([a], [b]) => byCanonical(a, b))

      return `Map{${entries.map(([k, v]) => `${k}:${v}`).join(",")}}`
    }

    if (value instanceof Set) {
      const items = [...value].map((item) => this.encode(item, `${path}<item>`))
      items.sort(byCanonical)

      return `Set[${items.join(",")}]`
    }

    if (isPlainObject(value)) {
      return this.encodeRecord(value, path)
    }

    if (hasToJSON(value)) {
      return this.encode(value.toJSON(), `${path}.toJSON()`)
    }

    throw new KeyBuildError(
      `Cannot build a cache key from an instance of ${value.constructor.name}; give it a toJSON() method`,
      { context: { path, type: value.constructor.name } },
    )
  }

  encodeRecord(record: Readonly<Record<string, unknown>>, path: string): string {
    const names = Object.keys(record).sort(byCanonical)
    const members: string[] = []

    for (const name of names) {
      const member = record[name]
      if (member === undefined) continue

      members.push(`${JSON.stringify(name)}:${this.encode(member, `${path}.${name}`)}`)
    }

    return `{${members.join(",")}}`
  }
}

/**
 * Deterministic text for a value: equal inputs give equal output, and plain
 * object key order never matters.
 *
 * @throws KeyBuildError for functions, symbols, cycles, invalid dates and class
 * instances without `toJSON()`.
 */
export function canonicalize(value: unknown, path = "$"): string {
  return new CanonicalEncoder().encode(value, path)
}

const instanceIds = new WeakMap<object, number>()
let nextInstanceId = 1

function instanceTag(value: object): string {
  let id = instanceIds.get(value)

  if (id === undefined) {
    id = nextInstanceId++
    instanceIds.set(value, id)
  }

  const className = typeof value.constructor === "function" ? value.constructor.name : ""
  return `${className || "Object"}#${id}`
}

function encodeMember(member: unknown, path: string): string {
  try {
    return new CanonicalEncoder().encode(member, path)
  } catch (err) {
    if (!(err instanceof KeyBuildError) || typeof member !== "object" || member === null) throw err

    return instanceTag(member)
  }
}

/**
 * Encodes a receiver as its class name followed by its own enumerable state,
 * or by its `toJSON()` result when it has one.
 *
 * Function-valued members are skipped. A member object with no canonical
 * form, such as an injected repository, is keyed by a per-process instance
 * tag (`Repo#3`), so its entries are only shared within this process.
 */
export function canonicalizeReceiver(receiver: object, path = "this"): string {
  const className = receiver.constructor.name || "Object"

  if (hasToJSON(receiver)) {
    return `${className}${new CanonicalEncoder().encode(receiver.toJSON(), path)}`
  }

  const entries: [string, unknown][] = Object.entries(receiver)
  const members: string[] = []

  entries.sort(([a], [b]) => byCanonical(a, b))

  for (const [name, member] of entries) {
    if (member === undefined || typeof member === "function") continue

    members.push(`${JSON.stringify(name)}:${encodeMember(member, `${path}.${name}`)}`)
  }

  return `${className}{${members.join(",")}}`
}
