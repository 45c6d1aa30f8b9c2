import { type CacheEvictionPolicy, cacheEvictionPolicies } from "@tablecache/cache"
import { booleanish } from "@tablecache/config"
import { type LogLevelName, logLevelNames } from "@tablecache/logger"
import { z } from "zod"

export const daoEnvSchema = z.object({
  TABLECACHE_CACHE_ENABLED: booleanish(true),
  TABLECACHE_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(1000),
  TABLECACHE_CACHE_EVICTION: z.enum(cacheEvictionPolicies).default("lru"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: booleanish(false),
  SERVICE_NAME: z.string().default("tablecache"),
})

export type DaoEnv = z.output<typeof daoEnvSchema>

/** Raw values accepted before validation, e.g. `"false"` for a flag. */
export type DaoEnvInput = z.input<typeof daoEnvSchema>

export type DaoConfig = {
  cache: {
    enabled: boolean
    maxEntries: number
    eviction: CacheEvictionPolicy
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }
}
