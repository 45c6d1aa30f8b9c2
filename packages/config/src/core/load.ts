import type { ZodType } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>

  /**
   * Applied in order, later sources winning; defaults to the process
   * environment. The DAO loader passes `.env.<NODE_ENV>`, the environment,
   * then in-code overrides.
   */
  sources?: ConfigSource[]
}

type MergedSources = {
  values: Record<string, unknown>

  /** Key to the name of the source that set it last. */
  provenance: Record<string, string>
}

async function mergeSources(sources: readonly ConfigSource[]): Promise<MergedSources> {
  const values: Record<string, unknown> = {}
  const provenance: Record<string, string> = {}

  for (const source of sources) {
    for (const [key, value] of Object.entries(await source.load())) {
      // An unset variable never masks an earlier source.
      if (value === undefined) continue

      values[key] = value
      provenance[key] = source.name
    }
  }

  return { values, provenance }
}

/**
 * Merge `sources`, validate the result against `schema` and record where
 * each key came from.
 *
 * Keys the schema fills in (e.g. `TABLECACHE_CACHE_MAX_ENTRIES` defaulting
 * to 1000) are explained as `"default"`.
 *
 * @throws {ConfigError} `config_invalid`, listing every failing key.
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const { values, provenance } = await mergeSources(sources)

  const result = schema.safeParse(values)

  if (!result.success) {
    throw ConfigError.invalid(
      result.error,
      sources.map((s) => s.name),
    )
  }

  for (const key of Object.keys(result.data)) {
    provenance[key] ??= "default"
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(values)))
}
