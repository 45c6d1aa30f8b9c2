export type LogContext = {
  service: string
  module: string
  env: string

  /** Table a DAO component is bound to. */
  table: string

  /** Store or async operation being logged (e.g. "insertBatch"). */
  operation: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
