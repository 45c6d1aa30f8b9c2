/**
 * Validated configuration plus provenance for each key.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ TABLECACHE_CACHE_MAX_ENTRIES: z.coerce.number().default(1000) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.value.TABLECACHE_CACHE_MAX_ENTRIES  // 1000
 * config.explain("TABLECACHE_CACHE_MAX_ENTRIES")  // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /**
   * Name of the source that provided the final value for `key`, or
   * `"default"` when the schema supplied it.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of every source that contributed at least one value. */
  sourcesUsed(): string[]

  /**
   * Keys present in the merged sources but absent from the validated value.
   * Typically typos or stale settings.
   */
  unknownKeys(): string[]
}
