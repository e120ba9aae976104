import { IncompleteFrameError, ProtocolError } from "../errors/protocol-errors"
import { type Frame, MAX_U64 } from "./frame"
import { CR, type FrameCursor, LF } from "./frame-cursor"

const SIMPLE = 0x2b // +
const ERROR = 0x2d // -
const INTEGER = 0x3a // :
const BULK = 0x24 // $
const ARRAY = 0x2a // *

/** Nested arrays deeper than this are rejected instead of recursing further. */
export const MAX_NESTING_DEPTH = 128

export type CheckResult =
  | { readonly kind: "complete"; readonly length: number }
  | { readonly kind: "incomplete" }

const utf8 = new TextDecoder("utf-8", { fatal: true })
const encoder = new TextEncoder()
const CRLF = Uint8Array.of(CR, LF)

/**
 * Determine whether the cursor holds one complete frame, without copying
 * payloads.
 *
 * On `complete`, the cursor sits right after the frame and `length` is its
 * byte length. Malformed input throws {@link ProtocolError}.
 */
export function checkFrame(cursor: FrameCursor): CheckResult {
  const start = cursor.position

  try {
    skipFrame(cursor, 0)
  } catch (err) {
    if (err instanceof IncompleteFrameError) {
      return { kind: "incomplete" }
    }
    throw err
  }

  return { kind: "complete", length: cursor.position - start }
}

/**
 * Decode one frame. Call only after {@link checkFrame} reported `complete`
 * for the same bytes; running out of input here is a protocol error.
 */
export function parseFrame(cursor: FrameCursor): Frame {
  try {
    return readFrame(cursor, 0)
  } catch (err) {
    if (err instanceof IncompleteFrameError) {
      throw new ProtocolError("Frame truncated during parse", {
        context: { offset: cursor.position },
        cause: err,
      })
    }
    throw err
  }
}

export function serializeFrame(frame: Frame): Uint8Array {
  const chunks: Uint8Array[] = []
  writeFrame(frame, chunks)

  return concat(chunks)
}

function skipFrame(cursor: FrameCursor, depth: number): void {
  const offset = cursor.position
  const type = cursor.getU8()

  switch (type) {
    case SIMPLE:
    case ERROR:
      cursor.getLine()
      return
    case INTEGER:
      cursor.getUnsigned()
      return
    case BULK: {
      const len = cursor.getLength()
      if (len === -1) return
      cursor.skip(len)
      cursor.expectCrlf()
      return
    }
    case ARRAY: {
      const count = arrayCount(cursor, depth, offset)
      for (let i = 0; i < count; i++) {
        skipFrame(cursor, depth + 1)
      }
      return
    }
    default:
      throw unknownType(type, offset)
  }
}

function readFrame(cursor: FrameCursor, depth: number): Frame {
  const offset = cursor.position
  const type = cursor.getU8()

  switch (type) {
    case SIMPLE:
      return { kind: "simple", value: decodeLine(cursor.getLine(), offset) }
    case ERROR:
      return { kind: "error", message: decodeLine(cursor.getLine(), offset) }
    case INTEGER:
      return { kind: "integer", value: cursor.getUnsigned() }
    case BULK: {
      const len = cursor.getLength()
      if (len === -1) return { kind: "null" }
      const value = cursor.getBytes(len)
      cursor.expectCrlf()
      return { kind: "bulk", value }
    }
    case ARRAY: {
      const count = arrayCount(cursor, depth, offset)
      const items: Frame[] = []
      for (let i = 0; i < count; i++) {
        items.push(readFrame(cursor, depth + 1))
      }
      return { kind: "array", items }
    }
    default:
      throw unknownType(type, offset)
  }
}

function arrayCount(cursor: FrameCursor, depth: number, offset: number): number {
  if (depth >= MAX_NESTING_DEPTH) {
    throw new ProtocolError("Array nesting too deep", { context: { offset, depth } })
  }

  const count = cursor.getLength()

  if (count < 0) {
    throw new ProtocolError("Negative array length", { context: { offset } })
  }

  return count
}

function unknownType(type: number, offset: number): ProtocolError {
  return new ProtocolError(`Unknown frame type byte 0x${type.toString(16).padStart(2, "0")}`, {
    context: { offset },
  })
}

function decodeLine(line: Uint8Array, offset: number): string {
  try {
    return utf8.decode(line)
  } catch (err) {
    throw new ProtocolError("Invalid UTF-8 in line", { context: { offset }, cause: err })
  }
}

function writeFrame(frame: Frame, out: Uint8Array[]): void {
  switch (frame.kind) {
    case "simple":
      out.push(lineBytes("+", frame.value))
      return
    case "error":
      out.push(lineBytes("-", frame.message))
      return
    case "integer":
      if (frame.value < 0n || frame.value > MAX_U64) {
        throw new RangeError(`Integer frame out of unsigned 64-bit range: ${frame.value}`)
      }
      out.push(encoder.encode(`:${frame.value}\r\n`))
      return
    case "bulk":
      out.push(encoder.encode(`$${frame.value.length}\r\n`), frame.value, CRLF)
      return
    case "null":
      out.push(encoder.encode("$-1\r\n"))
      return
    case "array":
      out.push(encoder.encode(`*${frame.items.length}\r\n`))
      for (const item of frame.items) {
        writeFrame(item, out)
      }
      return
  }
}

function lineBytes(prefix: string, text: string): Uint8Array {
  if (text.includes("\r") || text.includes("\n")) {
    throw new RangeError("Simple and error strings cannot contain CR or LF")
  }

  return encoder.encode(`${prefix}${text}\r\n`)
}

function concat(chunks: readonly Uint8Array[]): Uint8Array {
  let total = 0
  for (const c of chunks) total += c.length

  const out = new Uint8Array(total)
  let at = 0

  for (const c of chunks) {
    out.set(c, at)
    at += c.length
  }

  return out
}
