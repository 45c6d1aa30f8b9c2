import {
  CacheError,
  type CacheSerializer,
  type CacheStore,
  type OperationKey,
  SuperjsonSerializer,
  type TableName,
} from "@tablecache/cache"
import type { Logger } from "@tablecache/logger"
import { type ZodType, z } from "zod"
import type { RecordStore } from "../ports/record-store"
import type { RecordType } from "../ports/record-type"
import type { TableDao } from "../ports/table-dao"
import type { TableNameResolver } from "../ports/table-name-resolver"
import { DefaultTableNameResolver } from "./default-table-name-resolver"

export const QUERY_ALL: OperationKey = "queryAll"

export type CachingDaoDeps<TRecord, TId> = {
  store: RecordStore<TRecord, TId>
  cacheStore: CacheStore

  /**
   * Reads payloads written by `cacheStore`; must match the serializer the
   * store was built with. Defaults to superjson.
   */
  serializer?: CacheSerializer

  recordType: RecordType<TRecord>
  resolver?: TableNameResolver
  logger: Logger
}

export type CachingDaoOptions = {
  /**
   * When `false`, `queryAll` always reads the store and never touches the
   * cache. Writes still invalidate, since other DAOs may cache the table.
   */
  cacheEnabled: boolean
}

/**
 * Decorates a {@link RecordStore} with a table-scoped read cache.
 *
 * Every successful write clears every cached query for the table before
 * returning. Failed writes (`false` or a throw) leave the cache untouched.
 */
export class CachingDao<TRecord, TId> implements TableDao<TRecord, TId> {
  readonly tableName: TableName

  private readonly serializer: CacheSerializer
  private readonly listSchema: ZodType<TRecord[]>
  private readonly logger: Logger

  constructor(
    private readonly deps: CachingDaoDeps<TRecord, TId>,
    private readonly opts: CachingDaoOptions,
  ) {
    const resolver = deps.resolver ?? new DefaultTableNameResolver()

    this.tableName = resolver.resolve(deps.recordType)
    this.serializer = deps.serializer ?? new SuperjsonSerializer()
    this.listSchema = z.array(deps.recordType.schema)
    this.logger = deps.logger.child({ module: "caching-dao", table: this.tableName })
  }

  get cacheEnabled(): boolean {
    return this.opts.cacheEnabled
  }

  insert(record: TRecord): boolean {
    return this.invalidateOnSuccess("insert", this.deps.store.insert(record))
  }

  insertBatch(records: readonly TRecord[]): boolean {
    return this.invalidateOnSuccess("insertBatch", this.deps.store.insertBatch(records))
  }

  clearTable(): boolean {
    return this.invalidateOnSuccess("clearTable", this.deps.store.clearTable())
  }

  deleteById(id: TId): boolean {
    return this.invalidateOnSuccess("deleteById", this.deps.store.deleteById(id))
  }

  queryAll(): TRecord[] {
    if (!this.opts.cacheEnabled) return this.deps.store.queryAll()

    const cached = this.readCached()

    if (cached !== undefined) {
      this.logger.debug("Served from cache", { operation: QUERY_ALL, count: cached.length })
      return cached
    }

    const records = this.deps.store.queryAll()
    this.deps.cacheStore.addCache(this.tableName, QUERY_ALL, records)

    return records
  }

  private invalidateOnSuccess(operation: string, succeeded: boolean): boolean {
    if (succeeded) {
      this.deps.cacheStore.clearByTable(this.tableName)
    } else {
      this.logger.debug("Write rejected by store", { operation })
    }

    return succeeded
  }

  private readCached(): TRecord[] | undefined {
    const payload = this.deps.cacheStore.getCache(this.tableName, QUERY_ALL)

    if (payload === undefined) return undefined

    let decoded: unknown
    try {
      decoded = this.serializer.deserialize(payload)
    } catch (err) {
      return this.discardUnreadable(err)
    }

    // Validate only: the schema's output may strip or rewrite fields.
    if (this.isRecordList(decoded)) return decoded

    return this.discardUnreadable(this.listSchema.safeParse(decoded).error)
  }

  private isRecordList(value: unknown): value is TRecord[] {
    return this.listSchema.safeParse(value).success
  }

  private discardUnreadable(cause: unknown): undefined {
    this.logger.warn("Ignoring unreadable cache entry", {
      operation: QUERY_ALL,
      err: CacheError.decodeFailed(this.tableName, QUERY_ALL, cause),
    })

    return undefined
  }
}
