import { IncompleteFrameError, ProtocolError } from "../../errors/protocol-errors"
import { FrameCursor } from "../frame-cursor"

const encoder = new TextEncoder()

function cursorOf(input: string): FrameCursor {
  return new FrameCursor(encoder.encode(input))
}

describe("FrameCursor", () => {
  it("peekU8 does not advance, getU8 does", () => {
    const cursor = cursorOf("ab")

    expect(cursor.peekU8()).toBe(0x61)
    expect(cursor.position).toBe(0)
    expect(cursor.getU8()).toBe(0x61)
    expect(cursor.position).toBe(1)
    expect(cursor.remaining).toBe(1)
  })

  it("throws IncompleteFrameError past the end", () => {
    const cursor = cursorOf("a")
    cursor.skip(1)

    expect(() => cursor.getU8()).toThrow(IncompleteFrameError)
    expect(() => cursor.skip(1)).toThrow(IncompleteFrameError)
    expect(() => cursor.getBytes(2)).toThrow(IncompleteFrameError)
  })

  it("reports how many bytes are missing", () => {
    const cursor = cursorOf("abc")

    try {
      cursor.skip(5)
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(IncompleteFrameError)
      expect(err).toMatchObject({ code: "incomplete_frame", context: { position: 0, needed: 2 } })
    }
  })

  it("getLine returns bytes before CRLF and consumes the terminator", () => {
    const cursor = cursorOf("hello\r\nrest")

    expect(new TextDecoder().decode(cursor.getLine())).toBe("hello")
    expect(cursor.position).toBe(7)
  })

  it("getLine allows a bare line feed inside the line", () => {
    const cursor = cursorOf("a\nb\r\n")

    expect(cursor.getLine()).toEqual(encoder.encode("a\nb"))
  })

  it("getLine is incomplete until the terminator arrives", () => {
    expect(() => cursorOf("hello").getLine()).toThrow(IncompleteFrameError)
    expect(() => cursorOf("hello\r").getLine()).toThrow(IncompleteFrameError)
  })

  it("getLine rejects CR followed by anything but LF", () => {
    expect(() => cursorOf("he\rllo\r\n").getLine()).toThrow(ProtocolError)
  })

  it("getLength parses counts and the -1 marker", () => {
    expect(cursorOf("42\r\n").getLength()).toBe(42)
    expect(cursorOf("0\r\n").getLength()).toBe(0)
    expect(cursorOf("-1\r\n").getLength()).toBe(-1)
  })

  it("getLength rejects other negatives and junk", () => {
    expect(() => cursorOf("-2\r\n").getLength()).toThrow(ProtocolError)
    expect(() => cursorOf("4x\r\n").getLength()).toThrow(ProtocolError)
    expect(() => cursorOf(" 4\r\n").getLength()).toThrow(ProtocolError)
    expect(() => cursorOf("99999999999999999999\r\n").getLength()).toThrow("Length out of range")
  })

  it("getUnsigned parses up to 2^64 - 1", () => {
    expect(cursorOf("18446744073709551615\r\n").getUnsigned()).toBe(18446744073709551615n)
    expect(() => cursorOf("18446744073709551616\r\n").getUnsigned()).toThrow(
      "Integer out of unsigned 64-bit range",
    )
  })

  it("getBytes copies", () => {
    const source = encoder.encode("abc")
    const cursor = new FrameCursor(source, 1)

    const out = cursor.getBytes(2)
    source.fill(0)

    expect(out).toEqual(encoder.encode("bc"))
    expect(cursor.position).toBe(3)
  })

  it("expectCrlf rejects other bytes", () => {
    expect(() => cursorOf("\n\r").expectCrlf()).toThrow(ProtocolError)
    expect(() => cursorOf("\r").expectCrlf()).toThrow(IncompleteFrameError)
  })
})
