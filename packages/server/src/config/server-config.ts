import { parseArgs } from "node:util"
import {
  type ConfigSource,
  DotenvSource,
  EnvSource,
  type IConfig,
  loadConfig,
  ObjectSource,
} from "@respkv/config"
import { logLevelNames } from "@respkv/logger"
import { z } from "zod"
import { DEFAULT_MAX_FRAME_BYTES } from "../connection/connection"
import { DEFAULTS } from "../server/server-options"

export const ENV_PREFIX = "RESPKV_"

export const serverConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(DEFAULTS.port),
  HOST: z.string().min(1).default(DEFAULTS.host),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
  SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULTS.shutdownTimeoutMs),
  MAX_FRAME_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_FRAME_BYTES),
})

export type ServerConfig = z.infer<typeof serverConfigSchema>

export type LoadServerConfigOptions = {
  /** Command line arguments, without the node and script paths */
  argv?: string[]
  env?: Record<string, string | undefined>
  /** Directory holding the optional `.env` file */
  cwd?: string
}

/**
 * Sources, lowest precedence first: `.env`, `RESPKV_*` environment variables,
 * `--port`/`--host` flags.
 */
export function serverConfigSources(options: LoadServerConfigOptions = {}): ConfigSource[] {
  const { values } = parseArgs({
    args: options.argv ?? [],
    options: {
      port: { type: "string" },
      host: { type: "string" },
    },
    strict: true,
    allowPositionals: false,
  })

  return [
    new DotenvSource({
      file: ".env",
      required: false,
      prefix: ENV_PREFIX,
      ...(options.cwd !== undefined && { cwd: options.cwd }),
    }),
    new EnvSource({
      prefix: ENV_PREFIX,
      ...(options.env !== undefined && { env: options.env }),
    }),
    new ObjectSource({ PORT: values.port, HOST: values.host }, "argv"),
  ]
}

export async function loadServerConfig(
  options: LoadServerConfigOptions = {},
): Promise<IConfig<ServerConfig>> {
  return await loadConfig({ schema: serverConfigSchema, sources: serverConfigSources(options) })
}
