export const DEFAULT_BUFFER_CAPACITY = 4 * 1024

/**
 * Growable read buffer. Bytes are appended at the end and consumed from the
 * front; the consumed prefix is reclaimed by compaction before growing.
 */
export class ByteBuffer {
  private buf: Uint8Array
  private start = 0
  private end = 0

  constructor(initialCapacity: number = DEFAULT_BUFFER_CAPACITY) {
    this.buf = new Uint8Array(Math.max(1, initialCapacity))
  }

  get length(): number {
    return this.end - this.start
  }

  get isEmpty(): boolean {
    return this.length === 0
  }

  get capacity(): number {
    return this.buf.length
  }

  append(chunk: Uint8Array): void {
    if (chunk.length === 0) return

    this.reserve(chunk.length)
    this.buf.set(chunk, this.end)
    this.end += chunk.length
  }

  /** Unconsumed bytes. Invalidated by the next `append` or `advance`. */
  view(): Uint8Array {
    return this.buf.subarray(this.start, this.end)
  }

  advance(n: number): void {
    if (!Number.isInteger(n) || n < 0 || n > this.length) {
      throw new RangeError(`Cannot advance ${n} bytes, ${this.length} buffered`)
    }

    this.start += n

    if (this.start === this.end) {
      this.start = 0
      this.end = 0
    }
  }

  private reserve(n: number): void {
    if (this.buf.length - this.end >= n) return

    const len = this.length

    if (this.buf.length - len >= n) {
      this.buf.copyWithin(0, this.start, this.end)
    } else {
      let capacity = this.buf.length
      while (capacity - len < n) capacity *= 2

      const next = new Uint8Array(capacity)
      next.set(this.view())
      this.buf = next
    }

    this.start = 0
    this.end = len
  }
}
