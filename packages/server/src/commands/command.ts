import type { Milliseconds } from "@respkv/clock"

export type GetCommand = {
  kind: "get"
  key: string
}

export type SetCommand = {
  kind: "set"
  key: string
  value: Uint8Array
  /** From `EX` (seconds) or `PX` (milliseconds). Absent clears any deadline. */
  ttlMs?: Milliseconds
}

export type PingCommand = {
  kind: "ping"
  message?: Uint8Array
}

export type UnknownCommand = {
  kind: "unknown"
  /** Lower-cased command name as received */
  name: string
}

export type Command = GetCommand | SetCommand | PingCommand | UnknownCommand

export type CommandKind = Command["kind"]
