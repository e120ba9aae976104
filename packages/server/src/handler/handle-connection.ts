import { serializeError, toAppError } from "@respkv/errors"
import type { Logger } from "@respkv/logger"
import { error, type Frame, ProtocolError } from "@respkv/protocol"
import type { ExpiringStore } from "@respkv/store"
import { applyCommand } from "../commands/apply-command"
import { CommandError } from "../commands/command-error"
import { parseCommand } from "../commands/parse-command"
import type { Connection } from "../connection/connection"

export type ConnectionContext = {
  connection: Connection
  store: ExpiringStore
  logger: Logger
}

/**
 * Serve one client until it disconnects or fails. Never rejects: failures end
 * this connection only and are logged.
 */
export async function handleConnection(ctx: ConnectionContext): Promise<void> {
  const { connection, logger } = ctx

  try {
    for (;;) {
      const frame = await connection.readFrame()

      if (frame === null) {
        logger.debug("Connection closed by peer")
        return
      }

      await connection.writeFrame(execute(ctx, frame))
    }
  } catch (err) {
    await dropConnection(ctx, err)
  } finally {
    connection.close()
  }
}

function execute(ctx: ConnectionContext, frame: Frame): Frame {
  try {
    const command = parseCommand(frame)
    ctx.logger.trace("Command received", { command: command.kind })

    return applyCommand(command, ctx.store)
  } catch (err) {
    if (err instanceof CommandError) return error(err.message)
    throw err
  }
}

async function dropConnection(ctx: ConnectionContext, err: unknown): Promise<void> {
  if (err instanceof ProtocolError) {
    try {
      await ctx.connection.writeFrame(error(`ERR Protocol error: ${err.message}`))
    } catch (writeErr) {
      ctx.logger.debug("Could not send protocol error reply", {
        err: serializeError(writeErr),
      })
    }
  }

  const appError = toAppError(err)
  const meta = { err: serializeError(err) }

  if (appError.isOperational) ctx.logger.warn("Connection dropped", meta)
  else ctx.logger.error("Connection dropped", meta)
}
