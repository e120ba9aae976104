import { type Frame, ProtocolError } from "@respkv/protocol"
import { CommandError } from "./command-error"

const INTEGER = /^-?\d+$/

const utf8 = new TextDecoder("utf-8", { fatal: true })
const encoder = new TextEncoder()

/**
 * Positional reader over a command's argument frames (the name excluded).
 * Running out of arguments, or leaving some unread, is an arity error.
 */
export class CommandParser {
  private index = 0

  constructor(
    readonly command: string,
    private readonly args: readonly Frame[],
  ) {}

  hasNext(): boolean {
    return this.index < this.args.length
  }

  nextBytes(): Uint8Array {
    const frame = this.next()

    switch (frame.kind) {
      case "bulk":
        return frame.value
      case "simple":
        return encoder.encode(frame.value)
      default:
        throw new ProtocolError(`Unexpected ${frame.kind} frame in command arguments`)
    }
  }

  nextString(): string {
    const frame = this.next()

    switch (frame.kind) {
      case "simple":
        return frame.value
      case "bulk":
        try {
          return utf8.decode(frame.value)
        } catch (err) {
          throw new ProtocolError("Argument is not valid UTF-8", { cause: err })
        }
      default:
        throw new ProtocolError(`Unexpected ${frame.kind} frame in command arguments`)
    }
  }

  /** Decimal integer argument, within the safe integer range. */
  nextInteger(): number {
    const text = this.nextString()
    if (!INTEGER.test(text)) throw CommandError.notAnInteger()

    const value = Number(text)
    if (!Number.isSafeInteger(value)) throw CommandError.notAnInteger()

    return value
  }

  finish(): void {
    if (this.hasNext()) throw CommandError.wrongArity(this.command)
  }

  private next(): Frame {
    const frame = this.args[this.index]
    if (frame === undefined) throw CommandError.wrongArity(this.command)

    this.index++
    return frame
  }
}
