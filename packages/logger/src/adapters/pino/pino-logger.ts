import pino, {
  type DestinationStream,
  type Level,
  type Logger as PinoBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /** Existing pino logger to derive from; its level and sink are inherited. */
  base?: PinoBase

  /** Where JSON lines go. When set, `prettify` is ignored. */
  destination?: DestinationStream
}

const PRETTY_TRANSPORT = {
  target: "pino-pretty",
  options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "hostname,pid" },
} as const

function buildRoot(deps: PinoLoggerDeps, opts: Partial<LoggerOptions>): PinoBase {
  const pinoOpts: PinoOptions = {
    serializers: { err: errWithCause },
    ...(opts.level && { level: opts.level }),
    ...(opts.prettify && !deps.destination && { transport: PRETTY_TRANSPORT }),
  }

  return deps.destination ? pino(pinoOpts, deps.destination) : pino(pinoOpts)
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly pino: PinoBase

  constructor(
    deps: PinoLoggerDeps = {},
    private readonly opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    this.pino = (deps.base ?? buildRoot(deps, opts)).child(context)
  }

  private write(level: Level, message: string, meta: LogMeta<TContext> | undefined): void {
    this.pino[level](meta ?? {}, message)
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

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>({ base: this.pino }, this.opts, context)
  }
}
