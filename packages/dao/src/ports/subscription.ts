/**
 * Handle for something that can be stopped from the outside.
 */
export interface Subscription {
  readonly closed: boolean

  /** Idempotent. */
  unsubscribe(): void
}
