#!/usr/bin/env node
import { SystemClock } from "@respkv/clock"
import { PinoLogger } from "@respkv/logger"
import { ExpiringStore } from "@respkv/store"
import { loadServerConfig } from "../config/server-config"
import { createServer } from "../server/server"

async function main(): Promise<void> {
  const config = await loadServerConfig({ argv: process.argv.slice(2) })
  const { value } = config

  const logger = new PinoLogger(
    {},
    { level: value.LOG_LEVEL, prettify: value.LOG_PRETTY },
    { service: "respkv" },
  )

  logger.debug("Configuration loaded", { sources: config.sourcesUsed() })

  const clock = new SystemClock()
  const store = new ExpiringStore({ clock, logger: logger.child({ module: "store" }) })

  const server = createServer(
    { logger, clock, store },
    {
      port: value.PORT,
      host: value.HOST,
      shutdownTimeoutMs: value.SHUTDOWN_TIMEOUT_MS,
      maxFrameBytes: value.MAX_FRAME_BYTES,
    },
  )

  try {
    await server.setupProcessHandlers().start()
  } catch (err) {
    logger.fatal("Server failed to start", { err })
    await store.close()
    throw err
  }
}

main().catch((err: unknown) => {
  console.error(err)
  process.exitCode = 1
})
