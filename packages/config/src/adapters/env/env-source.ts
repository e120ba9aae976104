import type { ConfigSource } from "../../ports/source"
import { stripPrefix } from "../prefix"

export type EnvSourceOptions = {
  /** Only keys starting with the prefix are kept, with the prefix stripped (`RESPKV_PORT` → `PORT`) */
  prefix?: string
  /** Default: `process.env` */
  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix?: string | undefined
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    return stripPrefix(this.env, this.prefix)
  }
}
