import type { AppError } from "@tablecache/errors"
import type { Subscription } from "./subscription"

export type AsyncSuccess<T> = {
  kind: "ok"
  value: T
}

export type AsyncFailure = {
  kind: "error"
  error: AppError
}

/**
 * Result handed to an async callback. Operations that throw are delivered as
 * `error`; nothing is rethrown on the delivery context.
 */
export type AsyncOutcome<T> = AsyncSuccess<T> | AsyncFailure

export type AsyncCallback<T> = (outcome: AsyncOutcome<T>) => void

/**
 * - `scheduled`: submitted, not started
 * - `running`: work started or finished, outcome not yet delivered
 * - `delivered`: callback received `ok`
 * - `faulted`: callback received `error`
 * - `cancelled`: stopped before delivery; the callback never fires
 */
export type AsyncRunState = "scheduled" | "running" | "delivered" | "faulted" | "cancelled"

export interface AsyncRun extends Subscription {
  readonly operation: string
  readonly state: AsyncRunState

  /** Same as `unsubscribe()`. */
  cancel(): void
}
