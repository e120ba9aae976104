import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"
import { isFileNotFound } from "../fs-errors"
import { stripPrefix } from "../prefix"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example ".env", ".env.local"
   */
  file: string

  /** When `false`, a missing file loads as `{}` */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string

  /** Same filtering as `EnvSource`'s `prefix` */
  prefix?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    try {
      const content = await fs.readFile(filePath, "utf-8")

      return stripPrefix(parse(content), this.opts.prefix)
    } catch (err) {
      if (!this.opts.required && isFileNotFound(err)) {
        return {}
      }
      throw err
    }
  }
}
