export { applyCommand } from "./commands/apply-command"
export type {
  Command,
  CommandKind,
  GetCommand,
  PingCommand,
  SetCommand,
  UnknownCommand,
} from "./commands/command"
export { CommandError } from "./commands/command-error"
export { CommandParser } from "./commands/command-parser"
export { parseCommand } from "./commands/parse-command"
export {
  ENV_PREFIX,
  type LoadServerConfigOptions,
  loadServerConfig,
  type ServerConfig,
  serverConfigSchema,
  serverConfigSources,
} from "./config/server-config"
export type { ByteStream } from "./connection/byte-stream"
export {
  Connection,
  type ConnectionOptions,
  DEFAULT_MAX_FRAME_BYTES,
} from "./connection/connection"
export { ConnectionResetError } from "./connection/connection-errors"
export { SocketByteStream } from "./connection/socket-byte-stream"
export { type ConnectionContext, handleConnection } from "./handler/handle-connection"
export { type ConnectionTracker, type ServeContext, serve } from "./handler/serve"
export type { ServerHandle } from "./lifecycle/create-stopper"
export type { HookFailure, LifecycleHook, LifecycleHookContext } from "./lifecycle/lifecycle-hook"
export type { Listener, ServerAddress } from "./lifecycle/listen"
export type { StopResult } from "./lifecycle/shutdown"
export { createServer, Server, type ServerState } from "./server/server"
export { StartupError } from "./server/server-errors"
export type { ServerDependencies, ServerOptions } from "./server/server-options"
