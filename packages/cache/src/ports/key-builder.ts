export type KeyBuildInput = {
  /** Full namespace, registry prefix included. */
  namespace: string
  identity: string
  receiver?: object | undefined
  args: readonly unknown[]
  kwargs: Readonly<Record<string, unknown>>
}

export interface KeyBuilder {
  /** Throws `KeyBuildError` when an argument has no canonical form. */
  build(input: KeyBuildInput): string
}
