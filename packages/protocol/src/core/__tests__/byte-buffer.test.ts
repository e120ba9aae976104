import { ByteBuffer, DEFAULT_BUFFER_CAPACITY } from "../byte-buffer"

const bytes = (...values: number[]) => Uint8Array.from(values)

describe("ByteBuffer", () => {
  it("starts empty with 4 KiB of capacity", () => {
    const buffer = new ByteBuffer()

    expect(buffer.isEmpty).toBe(true)
    expect(buffer.length).toBe(0)
    expect(buffer.capacity).toBe(DEFAULT_BUFFER_CAPACITY)
    expect(DEFAULT_BUFFER_CAPACITY).toBe(4096)
  })

  it("appends and exposes unconsumed bytes", () => {
    const buffer = new ByteBuffer()

    buffer.append(bytes(1, 2))
    buffer.append(bytes(3))

    expect(buffer.view()).toEqual(bytes(1, 2, 3))
    expect(buffer.length).toBe(3)
  })

  it("advance consumes from the front", () => {
    const buffer = new ByteBuffer()
    buffer.append(bytes(1, 2, 3))

    buffer.advance(2)

    expect(buffer.view()).toEqual(bytes(3))
  })

  it("advance past the buffered length throws", () => {
    const buffer = new ByteBuffer()
    buffer.append(bytes(1))

    expect(() => buffer.advance(2)).toThrow(RangeError)
    expect(() => buffer.advance(-1)).toThrow(RangeError)
  })

  it("doubles capacity until the chunk fits", () => {
    const buffer = new ByteBuffer()
    const chunk = new Uint8Array(5000).fill(7)

    buffer.append(bytes(1))
    buffer.append(chunk)

    expect(buffer.capacity).toBe(8192)
    expect(buffer.length).toBe(5001)
    expect(buffer.view()[0]).toBe(1)
    expect(buffer.view()[5000]).toBe(7)
  })

  it("compacts the consumed prefix instead of growing when possible", () => {
    const buffer = new ByteBuffer(8)

    buffer.append(bytes(1, 2, 3, 4, 5, 6))
    buffer.advance(4)
    buffer.append(bytes(7, 8, 9, 10, 11))

    expect(buffer.capacity).toBe(8)
    expect(buffer.view()).toEqual(bytes(5, 6, 7, 8, 9, 10, 11))
  })

  it("ignores empty chunks", () => {
    const buffer = new ByteBuffer(8)

    buffer.append(new Uint8Array(0))

    expect(buffer.isEmpty).toBe(true)
  })
})
