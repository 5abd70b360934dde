/**
 * A source of raw configuration values. Sources only load; validation and
 * coercion happen in the schema. Later sources override earlier ones, and an
 * `undefined` value means "not provided".
 */
export interface ConfigSource {
  /** e.g. "env", "dotenv:.env" */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
