import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { type LogLevelName, logLevelNames } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type MemoryLogEntry = {
  level: LogLevelName
  message: string

  /** Child context merged with per-call meta, meta winning on conflict. */
  fields: Record<string, unknown>
}

/**
 * Keeps entries in an array instead of writing them anywhere. Children share
 * the parent's buffer.
 */
export class MemoryLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  constructor(
    private readonly opts: Partial<LoggerOptions> = {},
    private readonly context: LogContextPatch = {},
    private readonly sink: MemoryLogEntry[] = [],
  ) {}

  get entries(): readonly MemoryLogEntry[] {
    return this.sink
  }

  clear(): void {
    this.sink.length = 0
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): MemoryLogger<TContext & U> {
    return new MemoryLogger<TContext & U>(
      this.opts,
      { ...this.context, ...context },
      this.sink,
    )
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    const min = logLevelNames.indexOf(this.opts.level ?? "trace")
    if (logLevelNames.indexOf(level) < min) return

    this.sink.push({ level, message, fields: { ...this.context, ...meta } })
  }
}

export function createMemoryLogger<TContext extends LogContext = LogContext>(
  opts: Partial<LoggerOptions> = {},
  context: LogContextPatch = {},
): MemoryLogger<TContext> {
  return new MemoryLogger<TContext>(opts, context)
}
