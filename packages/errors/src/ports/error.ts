export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (table names, operation names,
 * record ids) so log sinks can index it without parsing messages.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if running the same operation again might succeed. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (a store rejecting a write, a cache
   * payload that no longer decodes), `false` for programmer errors such as
   * launching async work without an active subscription.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used by log serializers and `toJSON()`.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
