/**
 * Synchronous CRUD access to one table.
 *
 * Mutations report success as a boolean: `false` means the store refused the
 * write and nothing changed. Implementations may also throw; callers let the
 * error propagate.
 */
export interface RecordStore<TRecord, TId> {
  insert(record: TRecord): boolean

  /** All-or-nothing. */
  insertBatch(records: readonly TRecord[]): boolean

  clearTable(): boolean

  deleteById(id: TId): boolean

  queryAll(): TRecord[]
}
