import type { LogContext, LogContextPatch, LogMeta } from "./log-context"

export type LogMethod<TContext extends LogContext = LogContext> = (
  message: string,
  meta?: LogMeta<TContext>,
) => void

export interface Logger<TContext extends LogContext = LogContext> {
  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void
  fatal(message: string, meta?: LogMeta<TContext>): void

  /**
   * A logger whose entries carry this logger's context plus `context`, the
   * latter winning on conflicts. The parent is not changed.
   */
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}
