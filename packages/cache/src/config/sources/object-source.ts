import type { ConfigSource } from "./config-source"

export type ConfigOverrides = Record<string, string | number | boolean | undefined>

/** Programmatic overrides, stringified so they validate like env values. */
export class ObjectSource implements ConfigSource {
  readonly name = "overrides"

  constructor(private readonly overrides: ConfigOverrides) {}

  async load(): Promise<Record<string, string | undefined>> {
    const out: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.overrides)) {
      out[key] = value === undefined ? undefined : String(value)
    }

    return out
  }
}
