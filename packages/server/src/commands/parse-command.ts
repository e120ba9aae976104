import type { Milliseconds } from "@respkv/clock"
import { type Frame, ProtocolError } from "@respkv/protocol"
import type { Command, GetCommand, PingCommand, SetCommand } from "./command"
import { CommandError } from "./command-error"
import { CommandParser } from "./command-parser"

/**
 * Decode a request frame into a {@link Command}.
 *
 * @throws {ProtocolError} the frame is not a non-empty array of bulk or simple strings
 * @throws {CommandError} a known command with bad arguments
 */
export function parseCommand(frame: Frame): Command {
  if (frame.kind !== "array") {
    throw new ProtocolError(`Expected an array frame, got ${frame.kind}`)
  }

  const [head, ...args] = frame.items
  if (head === undefined) throw new ProtocolError("Empty command array")

  for (const item of frame.items) {
    if (item.kind !== "bulk" && item.kind !== "simple") {
      throw new ProtocolError(`Unexpected ${item.kind} frame in command`)
    }
  }

  const name = new CommandParser("", [head]).nextString().toLowerCase()
  const parser = new CommandParser(name, args)

  switch (name) {
    case "get":
      return parseGet(parser)
    case "set":
      return parseSet(parser)
    case "ping":
      return parsePing(parser)
    default:
      return { kind: "unknown", name }
  }
}

function parseGet(parser: CommandParser): GetCommand {
  const key = parser.nextString()
  parser.finish()

  return { kind: "get", key }
}

function parseSet(parser: CommandParser): SetCommand {
  const key = parser.nextString()
  const value = parser.nextBytes()
  const ttlMs = parser.hasNext() ? parseExpiry(parser) : undefined
  parser.finish()

  return { kind: "set", key, value, ...(ttlMs !== undefined && { ttlMs }) }
}

function parseExpiry(parser: CommandParser): Milliseconds {
  const unit = parser.nextString().toUpperCase()
  if (unit !== "EX" && unit !== "PX") throw CommandError.syntax()
  if (!parser.hasNext()) throw CommandError.syntax()

  const amount = parser.nextInteger()
  if (amount <= 0) throw CommandError.invalidExpireTime(parser.command)

  const ttlMs = unit === "EX" ? amount * 1000 : amount
  if (!Number.isSafeInteger(ttlMs)) throw CommandError.invalidExpireTime(parser.command)

  return ttlMs
}

function parsePing(parser: CommandParser): PingCommand {
  const message = parser.hasNext() ? parser.nextBytes() : undefined
  parser.finish()

  return { kind: "ping", ...(message !== undefined && { message }) }
}
