/** Machine-readable error code, snake_case by convention (`protocol_error`). */
export type ErrorCode = Lowercase<string>

/** Structured metadata carried by an error (offsets, keys, addresses). */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if retrying the same operation might succeed */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (`true`) or programmer error / invariant
   * violation (`false`).
   *
   * @remarks
   * A malformed frame from a client or a dropped socket is operational: the
   * connection ends, the server keeps running. A corrupted expiration index
   * is not.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used in log lines.
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
