/**
 * Validated configuration with provenance.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ MEMO_DEFAULT_TTL_SECONDS: z.coerce.number().default(900) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.value.MEMO_DEFAULT_TTL_SECONDS // 900
 * config.explain("MEMO_DEFAULT_TTL_SECONDS") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /**
   * Name of the source that provided the final value for `key`, or
   * `"default"` when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of the sources that contributed at least one value. */
  sourcesUsed(): string[]

  /** Keys some source provided that the schema does not define. */
  unknownKeys(): string[]
}
