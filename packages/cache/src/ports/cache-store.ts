import type { OperationKey, TableName } from "./cache-key"
import type { CachePayload } from "./cache-serializer"

/**
 * Process-local cache of serialized query results, keyed by
 * (table, operation) and invalidated one table at a time.
 *
 * @remarks
 * - One instance is shared by every DAO it is injected into. DAOs bound to
 *   the same table therefore share its invalidation.
 * - Every method is synchronous and runs to completion before any other
 *   call can observe the store.
 * - An entry must never outlive a successful write to its table; DAOs call
 *   {@link CacheStore.clearByTable} after each one.
 */
export interface CacheStore {
  /**
   * Look up the payload stored for (table, operation). No side effects
   * beyond eviction bookkeeping.
   */
  getCache(table: TableName, operation: OperationKey): CachePayload | undefined

  /**
   * Serialize `value` and store it under (table, operation), replacing any
   * previous entry.
   *
   * If serialization fails nothing is stored and the failure is logged; the
   * next lookup for the key is a miss.
   */
  addCache(table: TableName, operation: OperationKey, value: unknown): void

  /**
   * Remove every entry belonging to `table`. No-op when there are none.
   */
  clearByTable(table: TableName): void

  /** Number of entries currently held. */
  readonly size: number
}
