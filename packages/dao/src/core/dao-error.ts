import type { TableName } from "@tablecache/cache"
import { BaseError } from "@tablecache/errors"

export type DaoErrorCode = "subscription_required" | "async_operation_failed"

export class DaoError extends BaseError<DaoErrorCode> {
  /**
   * An async operation was requested without an active subscription group.
   * A programming error, not a runtime condition.
   */
  static subscriptionRequired(table: TableName, operation: string): DaoError {
    return new DaoError("must call subscribe() first", {
      code: "subscription_required",
      context: { table, operation },
      isOperational: false,
    })
  }

  static asyncOperationFailed(table: TableName, operation: string, cause: unknown): DaoError {
    return new DaoError(`Async ${operation} failed on table "${table}"`, {
      code: "async_operation_failed",
      context: { table, operation },
      cause,
    })
  }
}
