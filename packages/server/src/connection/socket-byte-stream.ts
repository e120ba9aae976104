import type { Socket } from "node:net"
import type { ByteStream } from "./byte-stream"
import { ConnectionResetError } from "./connection-errors"

export class SocketByteStream implements ByteStream {
  private readonly chunks: AsyncIterator<unknown>
  private closed = false

  constructor(private readonly socket: Socket) {
    this.chunks = socket[Symbol.asyncIterator]()
  }

  async read(): Promise<Uint8Array | null> {
    let next: IteratorResult<unknown>

    try {
      next = await this.chunks.next()
    } catch (err) {
      throw new ConnectionResetError("Socket read failed", { cause: err })
    }

    if (next.done) return null
    if (next.value instanceof Uint8Array) return next.value
    if (typeof next.value === "string") return Buffer.from(next.value, "utf8")

    throw new TypeError(`Unexpected socket chunk of type ${typeof next.value}`)
  }

  write(bytes: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.write(bytes, (err) => {
        if (err) reject(new ConnectionResetError("Socket write failed", { cause: err }))
        else resolve()
      })
    })
  }

  /** Half-closes after pending writes flush, then releases the socket. */
  close(): void {
    if (this.closed) return
    this.closed = true

    this.socket.end(() => this.socket.destroy())
  }
}
