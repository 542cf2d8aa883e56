/**
 * A validated configuration together with where each setting came from.
 */
export class LoadedConfig<T, K extends string> {
  constructor(
    readonly value: Readonly<T>,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly unknown: readonly string[],
  ) {
    Object.freeze(this.value)
  }

  /** Source that supplied `name`, or `"default"` when the schema filled it in. */
  explain(name: K): string {
    return this.provenance.get(name) ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(this.provenance.values())]
  }

  /** Variables under a recognised prefix that no setting reads; usually typos. */
  unknownKeys(): string[] {
    return [...this.unknown]
  }
}
