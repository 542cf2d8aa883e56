/**
 * One layer of raw settings. Layers are applied in order, later ones winning;
 * validation and coercion happen after the merge.
 */
export interface ConfigSource {
  /** Provenance label, e.g. `"env"` or `"dotenv:.env"`. */
  readonly name: string

  /** `undefined` values count as not provided. */
  load(): Promise<Record<string, string | undefined>>
}
