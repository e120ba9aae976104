/**
 * Validated configuration plus provenance.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ PORT: z.coerce.number().default(6379) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.value.PORT      // 6379
 * config.explain("PORT") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  /** Keys of the validated config */
  keys(): string[]

  /** Name of the source that provided the final value, or `"default"` */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct source names that contributed at least one value */
  sourcesUsed(): string[]

  /** Keys present in some source but not defined by the schema */
  unknownKeys(): string[]
}
