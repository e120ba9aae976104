import { BaseError, type ErrorContext } from "@respkv/errors"

export type ConnectionResetErrorOptions = {
  context?: ErrorContext
  cause?: unknown
}

/**
 * The peer went away mid-frame, or the socket failed under us.
 */
export class ConnectionResetError extends BaseError<"connection_reset"> {
  constructor(message = "Connection reset by peer", options: ConnectionResetErrorOptions = {}) {
    super(message, { code: "connection_reset", ...options })
  }
}
