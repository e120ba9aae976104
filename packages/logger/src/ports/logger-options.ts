import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * Adapters decide how to honor these; they only describe which entries are
 * emitted and whether output is meant for humans or for log processors.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Example: "info" suppresses "trace" and "debug" entries, including the
   * per-connection accept/close events.
   */
  level: LogLevelName

  /**
   * Pretty-print output for local development.
   *
   * @remarks
   * Leave disabled in production, where one JSON object per line is expected.
   */
  prettify?: boolean
}
