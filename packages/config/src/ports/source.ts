/**
 * A source of raw configuration values.
 *
 * Sources only load. Coercion and validation happen in `loadConfig` against
 * the zod schema; merging is by source order, later sources winning.
 */
export interface ConfigSource {
  /** Provenance label, e.g. `env`, `dotenv:.env`, `argv` */
  readonly name: string

  /**
   * Load flat key/value pairs. An `undefined` value means "not provided" and
   * never overrides an earlier source.
   */
  load(): Promise<Record<string, unknown>>
}
