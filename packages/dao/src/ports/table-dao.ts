import type { TableName } from "@tablecache/cache"
import type { RecordStore } from "./record-store"

/**
 * A {@link RecordStore} bound to a known table.
 */
export interface TableDao<TRecord, TId> extends RecordStore<TRecord, TId> {
  readonly tableName: TableName
}
