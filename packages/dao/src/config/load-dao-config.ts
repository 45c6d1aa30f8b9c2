import {
  type ConfigSource,
  DotenvSource,
  EnvSource,
  loadConfig,
  ObjectSource,
} from "@tablecache/config"
import { type DaoConfig, type DaoEnv, type DaoEnvInput, daoEnvSchema } from "./schema"

export function mapEnvToConfig(env: DaoEnv): DaoConfig {
  return {
    cache: {
      enabled: env.TABLECACHE_CACHE_ENABLED,
      maxEntries: env.TABLECACHE_CACHE_MAX_ENTRIES,
      eviction: env.TABLECACHE_CACHE_EVICTION,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
  }
}

/**
 * Sources, later winning: `.env.<NODE_ENV>` in `cwd` (optional), `env`,
 * then `overrides`.
 */
export async function loadDaoConfig(
  env: NodeJS.ProcessEnv,
  overrides?: Partial<DaoEnvInput>,
  cwd: string = process.cwd(),
): Promise<DaoConfig> {
  const nodeEnv = env.NODE_ENV ?? "development"

  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${nodeEnv}`, required: false, cwd }),
    new EnvSource({ env }),
    ...(overrides ? [new ObjectSource(overrides)] : []),
  ]

  const result = await loadConfig({ schema: daoEnvSchema, sources })

  return mapEnvToConfig(result.value)
}
