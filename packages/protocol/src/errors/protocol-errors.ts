import { BaseError, type ErrorContext } from "@respkv/errors"

export type ProtocolErrorOptions = {
  context?: ErrorContext
  cause?: unknown
}

/**
 * Malformed input on the wire. The connection that produced it is closed.
 */
export class ProtocolError extends BaseError<"protocol_error"> {
  constructor(message: string, options: ProtocolErrorOptions = {}) {
    super(message, { code: "protocol_error", ...options })
  }
}

/**
 * The cursor ran out of bytes before the frame was complete.
 *
 * Internal to the codec and the connection reader: `checkFrame` turns it into
 * an `incomplete` result, `parseFrame` into a {@link ProtocolError}.
 */
export class IncompleteFrameError extends BaseError<"incomplete_frame"> {
  constructor(position: number, needed: number) {
    super("Incomplete frame", {
      code: "incomplete_frame",
      context: { position, needed },
      isRetryable: true,
    })
  }
}
