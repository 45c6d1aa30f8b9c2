import type { ZodType } from "zod"

/**
 * The part of a {@link RecordType} that determines its table name.
 */
export type RecordTypeIdentity = Readonly<{
  /** Record type name, e.g. "User". */
  name: string

  /** Explicit table name. Takes precedence over `name` when non-empty. */
  tableName?: string
}>

/**
 * Runtime descriptor of a record shape.
 *
 * `schema` validates cached query results when they are read back, so a
 * payload written by an older shape is treated as a miss instead of being
 * returned.
 */
export type RecordType<TRecord> = RecordTypeIdentity &
  Readonly<{
    schema: ZodType<TRecord>
  }>
