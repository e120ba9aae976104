import type { Server as NetServer, Socket } from "node:net"
import type { Logger } from "@respkv/logger"
import type { ExpiringStore } from "@respkv/store"
import { Connection } from "../connection/connection"
import { SocketByteStream } from "../connection/socket-byte-stream"
import { handleConnection } from "./handle-connection"

export type ServeContext = {
  store: ExpiringStore
  logger: Logger
  maxFrameBytes: number
}

export interface ConnectionTracker {
  /** Sockets currently open */
  readonly size: number

  /** Ends every open socket once its pending writes have flushed. */
  endAll(): void
}

/**
 * Attach the command handler to `listener`. Every accepted socket is served
 * independently against the shared store.
 */
export function serve(listener: NetServer, ctx: ServeContext): ConnectionTracker {
  const sockets = new Set<Socket>()
  let nextId = 0

  listener.on("connection", (socket) => {
    nextId++
    sockets.add(socket)

    const logger = ctx.logger.child({
      connectionId: String(nextId),
      remoteAddress: `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`,
    })

    socket.on("error", (err) => logger.debug("Socket error", { err }))
    socket.once("close", () => {
      sockets.delete(socket)
      logger.debug("Connection closed")
    })

    logger.debug("Connection accepted")

    const connection = new Connection(new SocketByteStream(socket), {
      maxFrameBytes: ctx.maxFrameBytes,
    })

    handleConnection({ connection, store: ctx.store, logger }).catch((err: unknown) => {
      logger.error("Connection handler crashed", { err })
      socket.destroy()
    })
  })

  return {
    get size() {
      return sockets.size
    },
    endAll: () => {
      for (const socket of sockets) socket.end()
    },
  }
}

export type ServeFn = typeof serve
