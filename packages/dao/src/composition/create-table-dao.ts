import {
  type CacheSerializer,
  type CacheStore,
  createMemoryCacheStore,
  SuperjsonSerializer,
} from "@tablecache/cache"
import { createPinoLogger, type Logger } from "@tablecache/logger"
import { ImmediateExecutor } from "../adapters/executors/immediate-executor"
import { MicrotaskExecutor } from "../adapters/executors/microtask-executor"
import type { DaoConfig } from "../config/schema"
import { AsyncDao } from "../core/async-dao"
import { CachingDao } from "../core/caching-dao"
import { DeliveryQueue } from "../core/delivery-queue"
import type { Executor } from "../ports/executor"
import type { RecordStore } from "../ports/record-store"
import type { RecordType } from "../ports/record-type"
import type { TableNameResolver } from "../ports/table-name-resolver"

export type CreateTableDaoOptions<TRecord, TId> = {
  store: RecordStore<TRecord, TId>
  recordType: RecordType<TRecord>
  config: DaoConfig

  /** Defaults to a pino logger built from `config.logging`. */
  logger?: Logger

  /**
   * Share one store between DAOs so writes through any of them invalidate
   * the same table. Defaults to a new memory store sized from `config.cache`.
   */
  cacheStore?: CacheStore

  /** Must match the serializer `cacheStore` was built with. */
  serializer?: CacheSerializer

  resolver?: TableNameResolver

  /** Defaults to {@link ImmediateExecutor}. */
  background?: Executor

  /** Defaults to a queue drained on microtasks. */
  delivery?: DeliveryQueue
}

export type TableDaoServices<TRecord, TId> = {
  dao: CachingDao<TRecord, TId>
  asyncDao: AsyncDao<TRecord, TId>
  cacheStore: CacheStore
  logger: Logger
}

export function createTableDao<TRecord, TId>(
  opts: CreateTableDaoOptions<TRecord, TId>,
): TableDaoServices<TRecord, TId> {
  const { config } = opts

  const logger =
    opts.logger ??
    createPinoLogger(
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.logging.serviceName },
    )

  const serializer = opts.serializer ?? new SuperjsonSerializer()

  const cacheStore =
    opts.cacheStore ??
    createMemoryCacheStore(
      { maxEntries: config.cache.maxEntries, eviction: config.cache.eviction },
      { logger, serializer },
    )

  const dao = new CachingDao<TRecord, TId>(
    {
      store: opts.store,
      cacheStore,
      serializer,
      recordType: opts.recordType,
      logger,
      ...(opts.resolver && { resolver: opts.resolver }),
    },
    { cacheEnabled: config.cache.enabled },
  )

  const asyncDao = new AsyncDao<TRecord, TId>({
    dao,
    background: opts.background ?? new ImmediateExecutor(),
    delivery: opts.delivery ?? new DeliveryQueue({ scheduler: new MicrotaskExecutor(), logger }),
    logger,
  })

  return { dao, asyncDao, cacheStore, logger }
}
