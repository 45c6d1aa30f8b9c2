import type { TableName } from "@tablecache/cache"
import type { RecordTypeIdentity } from "./record-type"

export interface TableNameResolver {
  resolve(recordType: RecordTypeIdentity): TableName
}
