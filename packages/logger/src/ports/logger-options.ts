import type { LogLevelName } from "./log-level"

/**
 * Policy options honoured by every Logger adapter.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit. "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Pretty-print for humans instead of emitting JSON lines.
   *
   * @remarks
   * For local development only; ignored when an explicit destination stream
   * is supplied.
   */
  prettify?: boolean
}
