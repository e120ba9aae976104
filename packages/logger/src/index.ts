export { NullLogger } from "./adapters/null/null-logger"
export { PinoLogger, type PinoLoggerDeps } from "./adapters/pino/pino-logger"
export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export { isLogLevelName, type LogLevelName, logLevelNames } from "./ports/log-level"
export type { LogMethod, Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
