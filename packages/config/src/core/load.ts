import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** Merged in order; a later source overrides an earlier one. Default: `[new EnvSource()]` */
  sources?: ConfigSource[]
}

type Merged = {
  raw: Record<string, unknown>
  /** key → name of the source that set it last */
  origin: Map<string, string>
}

/** Merge the sources, validate against `schema`, and record where each value came from. */
export async function loadConfig<T extends Record<string, unknown>>(
  options: LoadConfigOptions<T>,
): Promise<IConfig<T>> {
  const sources = options.sources ?? [new EnvSource()]
  const { raw, origin } = await mergeSources(sources)
  const parsed = options.schema.safeParse(raw)

  if (!parsed.success) {
    throw new ConfigError(`Configuration validation failed:\n${z.prettifyError(parsed.error)}`, {
      sources: sources.map((source) => source.name),
      cause: parsed.error,
    })
  }

  const provenance = Object.fromEntries(
    Object.keys(parsed.data).map((key) => [key, origin.get(key) ?? "default"]),
  )

  return new Config<T>(parsed.data, provenance, new Set(origin.keys()))
}

async function mergeSources(sources: readonly ConfigSource[]): Promise<Merged> {
  const raw: Record<string, unknown> = {}
  const origin = new Map<string, string>()

  for (const source of sources) {
    const entries = Object.entries(await source.load()).filter(([, value]) => value !== undefined)

    for (const [key, value] of entries) {
      raw[key] = value
      origin.set(key, source.name)
    }
  }

  return { raw, origin }
}
