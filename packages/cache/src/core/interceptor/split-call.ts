import { ConfigurationError } from "../../errors/cache-errors"
import type { CacheRequest, CacheResponse, HttpExchange } from "../../ports/http-exchange"
import { isPlainObject } from "../key/canonical"

export type InjectedNames = {
  request: string
  response: string
}

export function injectedNames(namespace: string): InjectedNames {
  return { request: `__${namespace}_request`, response: `__${namespace}_response` }
}

export type SplitCall = {
  keyArgs: readonly unknown[]
  keyKwargs: Readonly<Record<string, unknown>>
  exchange: HttpExchange
}

function isCacheRequest(value: unknown): value is CacheRequest {
  return (
    typeof value === "object" &&
    value !== null &&
    "method" in value &&
    typeof value.method === "string" &&
    "header" in value &&
    typeof value.header === "function"
  )
}

function isCacheResponse(value: unknown): value is CacheResponse {
  return (
    typeof value === "object" &&
    value !== null &&
    "setHeader" in value &&
    typeof value.setHeader === "function" &&
    "setStatus" in value &&
    typeof value.setStatus === "function"
  )
}

function takeInjected<T>(
  named: Record<string, unknown>,
  name: string,
  guard: (value: unknown) => value is T,
): T | undefined {
  if (!(name in named)) return undefined

  const value = named[name]
  Reflect.deleteProperty(named, name)

  if (value === undefined) return undefined
  if (!guard(value)) {
    throw new ConfigurationError(`Injected argument ${name} has the wrong shape`)
  }

  return value
}

/**
 * Separates a call into what the key sees and what the handler gets.
 *
 * A trailing plain object holds the named arguments. Injected request and
 * response entries are taken out of it in place (the wrapper owns `args`), and
 * names in `exclude` are left for the handler but kept out of the key.
 */
export function splitCall<A extends unknown[]>(
  args: A,
  names: InjectedNames,
  exclude: ReadonlySet<string>,
): SplitCall {
  const lastIndex = args.length - 1
  const last = args[lastIndex]

  if (!isPlainObject(last)) {
    return { keyArgs: [...args], keyKwargs: {}, exchange: {} }
  }

  const named = { ...last }
  const exchange: HttpExchange = {
    request: takeInjected(named, names.request, isCacheRequest),
    response: takeInjected(named, names.response, isCacheResponse),
  }
  args[lastIndex] = named

  const keyKwargs: Record<string, unknown> = {}
  for (const [name, value] of Object.entries(named)) {
    if (!exclude.has(name)) keyKwargs[name] = value
  }

  return { keyArgs: args.slice(0, lastIndex), keyKwargs, exchange }
}
