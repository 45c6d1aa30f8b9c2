/**
 * A source of raw configuration values.
 *
 * Sources only load; validation and coercion happen once, in `loadConfig`,
 * after every source has been merged. Later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env" or "dotenv:.env.test". */
  readonly name: string

  /**
   * Load values. A key mapped to `undefined` counts as not provided.
   */
  load(): Promise<Record<string, unknown>>
}
