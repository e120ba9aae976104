import {
  ByteBuffer,
  checkFrame,
  type Frame,
  FrameCursor,
  ProtocolError,
  parseFrame,
  serializeFrame,
} from "@respkv/protocol"
import type { ByteStream } from "./byte-stream"
import { ConnectionResetError } from "./connection-errors"

export const DEFAULT_MAX_FRAME_BYTES = 512 * 1024 * 1024

export type ConnectionOptions = {
  /** Buffered bytes allowed before a frame must have completed. */
  maxFrameBytes?: number
}

/**
 * Frame-level view of a {@link ByteStream}.
 *
 * Bytes are buffered until `checkFrame` reports a complete frame; only that
 * frame's bytes are consumed, so pipelined requests stay buffered for the next
 * call.
 */
export class Connection {
  private readonly buffer = new ByteBuffer()
  private readonly maxFrameBytes: number

  constructor(
    private readonly stream: ByteStream,
    options: ConnectionOptions = {},
  ) {
    this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES
  }

  /** Buffered bytes not yet returned as a frame. */
  get buffered(): number {
    return this.buffer.length
  }

  /**
   * Next frame, or `null` when the peer closed cleanly between frames.
   *
   * @throws {ConnectionResetError} the peer closed in the middle of a frame
   * @throws {ProtocolError} malformed bytes, or a frame larger than `maxFrameBytes`
   */
  async readFrame(): Promise<Frame | null> {
    for (;;) {
      const frame = this.tryParseFrame()
      if (frame !== undefined) return frame

      if (this.buffer.length > this.maxFrameBytes) {
        throw new ProtocolError("Frame exceeds maximum size", {
          context: { buffered: this.buffer.length, maxFrameBytes: this.maxFrameBytes },
        })
      }

      const chunk = await this.stream.read()

      if (chunk === null) {
        if (this.buffer.isEmpty) return null

        throw new ConnectionResetError("Connection reset by peer", {
          context: { buffered: this.buffer.length },
        })
      }

      this.buffer.append(chunk)
    }
  }

  async writeFrame(frame: Frame): Promise<void> {
    await this.stream.write(serializeFrame(frame))
  }

  close(): void {
    this.stream.close()
  }

  private tryParseFrame(): Frame | undefined {
    if (this.buffer.isEmpty) return undefined

    const bytes = this.buffer.view()
    const check = checkFrame(new FrameCursor(bytes))
    if (check.kind === "incomplete") return undefined

    const frame = parseFrame(new FrameCursor(bytes))
    this.buffer.advance(check.length)

    return frame
  }
}
