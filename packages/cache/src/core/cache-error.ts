import { BaseError } from "@tablecache/errors"
import type { OperationKey, TableName } from "../ports/cache-key"

export type CacheErrorCode = "cache_encode_failed" | "cache_decode_failed"

/**
 * Cache payload failures. Logged, never thrown to data-access callers: the
 * affected lookup is treated as a miss.
 */
export class CacheError extends BaseError<CacheErrorCode> {
  static encodeFailed(table: TableName, operation: OperationKey, cause: unknown): CacheError {
    return new CacheError("Failed to serialize cache entry", {
      code: "cache_encode_failed",
      context: { table, operation },
      cause,
    })
  }

  static decodeFailed(table: TableName, operation: OperationKey, cause: unknown): CacheError {
    return new CacheError("Failed to decode cache entry", {
      code: "cache_decode_failed",
      context: { table, operation },
      cause,
    })
  }
}
