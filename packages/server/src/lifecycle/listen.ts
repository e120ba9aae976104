import net from "node:net"
import type { ServeFn } from "../handler/serve"
import type { ResolvedServerOptions, ServerDependencies } from "../server/server-options"
import type { Closeable } from "./shutdown"

export type ServerAddress = { host: string; port: number }

export interface Listener extends Closeable {
  /** Bound address; the real port when `0` was requested. */
  readonly address: ServerAddress
}

export type ListenContext = {
  options: ResolvedServerOptions
  deps: ServerDependencies
  serve: ServeFn
}

/**
 * Bind a TCP listener and start serving connections on it.
 */
export async function listen(ctx: ListenContext): Promise<Listener> {
  const { options, deps } = ctx
  const server = net.createServer()

  const connections = ctx.serve(server, {
    store: deps.store,
    logger: deps.logger,
    maxFrameBytes: options.maxFrameBytes,
  })

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject)
    server.listen(options.port, options.host, () => {
      server.off("error", reject)
      resolve()
    })
  })

  const bound = server.address()

  if (bound === null || typeof bound === "string") {
    server.close()
    throw new Error(`Unexpected listener address: ${String(bound)}`)
  }

  const address: ServerAddress = { host: bound.address, port: bound.port }

  server.on("error", (err) => deps.logger.error("Listener error", { err }))
  deps.logger.info("Server listening", address)

  return {
    address,
    close: (callback) => {
      server.close(callback)
      connections.endAll()
    },
  }
}

export type ListenFn = typeof listen
