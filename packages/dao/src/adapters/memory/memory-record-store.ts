import type { RecordStore } from "../../ports/record-store"

export type MemoryRecordStoreOptions<TRecord, TId> = {
  /** Extracts the primary key. Ids are compared with `SameValueZero`. */
  idOf: (record: TRecord) => TId
}

/**
 * In-process table. Rows are cloned on the way in and out, so callers never
 * hold a reference to stored state.
 */
export class MemoryRecordStore<TRecord, TId> implements RecordStore<TRecord, TId> {
  private readonly rows = new Map<TId, TRecord>()

  constructor(private readonly opts: MemoryRecordStoreOptions<TRecord, TId>) {}

  get size(): number {
    return this.rows.size
  }

  /** `false` when a row with the same id exists. */
  insert(record: TRecord): boolean {
    const id = this.opts.idOf(record)

    if (this.rows.has(id)) return false

    this.rows.set(id, structuredClone(record))
    return true
  }

  /**
   * `false`, with nothing written, when any id is already stored or appears
   * twice in `records`.
   */
  insertBatch(records: readonly TRecord[]): boolean {
    const ids = new Set<TId>()

    for (const record of records) {
      const id = this.opts.idOf(record)

      if (this.rows.has(id) || ids.has(id)) return false

      ids.add(id)
    }

    for (const record of records) {
      this.rows.set(this.opts.idOf(record), structuredClone(record))
    }

    return true
  }

  clearTable(): boolean {
    this.rows.clear()
    return true
  }

  /** `false` when no row has this id. */
  deleteById(id: TId): boolean {
    return this.rows.delete(id)
  }

  /** Insertion order. */
  queryAll(): TRecord[] {
    return [...this.rows.values()].map((row) => structuredClone(row))
  }
}
