import type { ConfigSource } from "./config-source"

export type EnvSourceOptions = {
  env?: Record<string, string | undefined>
  /** Only variables starting with one of these are read. */
  prefixes?: readonly string[]
}

export class EnvSource implements ConfigSource {
  readonly name = "env"

  private readonly env: Record<string, string | undefined>
  private readonly prefixes: readonly string[] | undefined

  constructor(options: EnvSourceOptions = {}) {
    this.env = options.env ?? process.env
    this.prefixes = options.prefixes
  }

  async load(): Promise<Record<string, string | undefined>> {
    const { prefixes } = this
    if (!prefixes) return { ...this.env }

    return Object.fromEntries(
      Object.entries(this.env).filter(([key]) => prefixes.some((p) => key.startsWith(p))),
    )
  }
}
