/**
 * Name of the table whose query results are cached. Every entry belongs to
 * exactly one table, and invalidation always clears a whole table.
 */
export type TableName = string

/**
 * Identifies the query shape within a table (e.g. "queryAll").
 */
export type OperationKey = string

/**
 * Composite identity of one cached query result.
 *
 * @example
 * ```ts
 * const key: CacheKey = { table: "users", operation: "queryAll" }
 * ```
 */
export type CacheKey = Readonly<{
  table: TableName
  operation: OperationKey
}>
