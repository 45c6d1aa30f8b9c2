import type { ZodType } from "zod"
import type { RecordType } from "../ports/record-type"

export type DefineRecordTypeOptions = {
  tableName?: string
}

/**
 * @example
 * ```ts
 * const User = defineRecordType("User", z.object({ id: z.number(), name: z.string() }))
 * ```
 */
export function defineRecordType<TRecord>(
  name: string,
  schema: ZodType<TRecord>,
  opts: DefineRecordTypeOptions = {},
): RecordType<TRecord> {
  return Object.freeze({
    name,
    schema,
    ...(opts.tableName !== undefined && { tableName: opts.tableName }),
  })
}
