/** Well-known fields a log entry may be scoped by. */
export type LogContext = {
  service: string
  module: string
  connectionId: string
  remoteAddress: string
  command: string
  env: string
}

export type LogEvent = {
  /** Serialized with its cause chain by the pino adapter. */
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/** Fields `child()` adds to, or overrides in, the parent's context. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
