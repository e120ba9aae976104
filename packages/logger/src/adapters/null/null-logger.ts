import type { LogContext, LogContextPatch } from "../../ports/log-context"
import type { LogMethod, Logger } from "../../ports/logger"

const discard: LogMethod = () => {}

/** Drops everything; children are null loggers too. */
export class NullLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  readonly trace: LogMethod<TContext> = discard
  readonly debug: LogMethod<TContext> = discard
  readonly info: LogMethod<TContext> = discard
  readonly warn: LogMethod<TContext> = discard
  readonly error: LogMethod<TContext> = discard
  readonly fatal: LogMethod<TContext> = discard

  child<U extends LogContextPatch>(_context: U): Logger<TContext & U> {
    return new NullLogger<TContext & U>()
  }
}
