import type { TableName } from "@tablecache/cache"
import type { RecordTypeIdentity } from "../ports/record-type"
import type { TableNameResolver } from "../ports/table-name-resolver"

export class DefaultTableNameResolver implements TableNameResolver {
  resolve(recordType: RecordTypeIdentity): TableName {
    const explicit = recordType.tableName?.trim()

    if (explicit) return explicit

    return recordType.name.toLowerCase()
  }
}
