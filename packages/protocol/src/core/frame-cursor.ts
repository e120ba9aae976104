import { IncompleteFrameError, ProtocolError } from "../errors/protocol-errors"
import { MAX_U64 } from "./frame"

export const CR = 0x0d
export const LF = 0x0a

const DIGIT_0 = 0x30
const DIGIT_9 = 0x39
const MINUS = 0x2d

/**
 * Read position over a byte slice.
 *
 * Every read that would run past the end throws {@link IncompleteFrameError};
 * malformed content throws {@link ProtocolError}. Reads never copy except
 * {@link FrameCursor.getBytes}.
 */
export class FrameCursor {
  private pos: number

  constructor(
    private readonly bytes: Uint8Array,
    position = 0,
  ) {
    this.pos = position
  }

  get position(): number {
    return this.pos
  }

  get remaining(): number {
    return this.bytes.length - this.pos
  }

  peekU8(): number {
    this.require(1)

    return this.byteAt(this.pos)
  }

  getU8(): number {
    const b = this.peekU8()
    this.pos += 1

    return b
  }

  skip(n: number): void {
    this.require(n)
    this.pos += n
  }

  /** Copy of the next `n` bytes. */
  getBytes(n: number): Uint8Array {
    this.require(n)
    const out = this.bytes.slice(this.pos, this.pos + n)
    this.pos += n

    return out
  }

  /** Consume a `\r\n` terminator. */
  expectCrlf(): void {
    const at = this.pos

    if (this.getU8() !== CR || this.getU8() !== LF) {
      throw new ProtocolError("Expected CRLF terminator", { context: { offset: at } })
    }
  }

  /**
   * Bytes up to the next `\r\n`, terminator consumed and excluded.
   * A `\r` followed by anything but `\n` is malformed.
   */
  getLine(): Uint8Array {
    const start = this.pos

    for (let i = start; i < this.bytes.length; i++) {
      if (this.byteAt(i) !== CR) continue

      if (i + 1 >= this.bytes.length) break

      if (this.byteAt(i + 1) !== LF) {
        throw new ProtocolError("Carriage return not followed by line feed", {
          context: { offset: i },
        })
      }

      this.pos = i + 2

      return this.bytes.subarray(start, i)
    }

    throw new IncompleteFrameError(this.pos, 1)
  }

  /** Unsigned decimal line in the 64-bit range. */
  getUnsigned(): bigint {
    const start = this.pos
    const line = this.getLine()
    const value = parseDigits(line, start)

    if (value > MAX_U64) {
      throw new ProtocolError("Integer out of unsigned 64-bit range", {
        context: { offset: start },
      })
    }

    return value
  }

  /**
   * Length or count line: a non-negative decimal, or `-1`.
   */
  getLength(): number {
    const start = this.pos
    const line = this.getLine()

    if (line.length === 2 && line[0] === MINUS && line[1] === DIGIT_0 + 1) {
      return -1
    }

    const value = parseDigits(line, start)

    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new ProtocolError("Length out of range", { context: { offset: start } })
    }

    return Number(value)
  }

  private require(n: number): void {
    if (this.remaining < n) {
      throw new IncompleteFrameError(this.pos, n - this.remaining)
    }
  }

  private byteAt(i: number): number {
    return this.bytes[i] ?? 0
  }
}

function parseDigits(line: Uint8Array, offset: number): bigint {
  if (line.length === 0) {
    throw new ProtocolError("Expected a decimal number", { context: { offset } })
  }

  let value = 0n

  for (const b of line) {
    if (b < DIGIT_0 || b > DIGIT_9) {
      throw new ProtocolError("Expected a decimal number", { context: { offset } })
    }
    value = value * 10n + BigInt(b - DIGIT_0)
  }

  return value
}
