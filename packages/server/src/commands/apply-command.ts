import { bulk, error, type Frame, nil, simple } from "@respkv/protocol"
import type { ExpiringStore } from "@respkv/store"
import type { Command } from "./command"

/**
 * Run a command against the store and build its reply.
 */
export function applyCommand(command: Command, store: ExpiringStore): Frame {
  switch (command.kind) {
    case "get": {
      const result = store.get(command.key)
      return result.kind === "found" ? bulk(result.value) : nil
    }
    case "set":
      store.set(
        command.key,
        command.value,
        command.ttlMs === undefined ? {} : { ttlMs: command.ttlMs },
      )
      return simple("OK")
    case "ping":
      return command.message === undefined ? simple("PONG") : bulk(command.message)
    case "unknown":
      return error(`ERR unknown command '${singleLine(command.name)}'`)
  }
}

/** Error replies are line-terminated, so the echoed name must not break the line. */
function singleLine(text: string): string {
  return text.replace(/[\r\n]+/g, " ")
}
