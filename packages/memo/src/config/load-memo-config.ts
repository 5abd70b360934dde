import { type ConfigSource, DotenvSource, EnvSource, loadConfig, ObjectSource } from "@memento/config"
import { type MemoConfig, mapEnvToMemoConfig, memoEnvSchema } from "./schema"

export type LoadMemoConfigOptions = {
  env?: Record<string, string | undefined>
  /** Applied last, over `.env` files and the environment. */
  overrides?: Record<string, unknown>
  cwd?: string
}

/**
 * Read memoization settings from `.env`, `.env.<NODE_ENV>`, the process
 * environment and `overrides`, later sources winning.
 */
export async function loadMemoConfig(opts: LoadMemoConfigOptions = {}): Promise<MemoConfig> {
  const env = opts.env ?? process.env
  const cwd = opts.cwd ?? process.cwd()

  const sources: ConfigSource[] = [
    new DotenvSource({ file: ".env", required: false, cwd }),
    ...(env.NODE_ENV ? [new DotenvSource({ file: `.env.${env.NODE_ENV}`, required: false, cwd })] : []),
    new EnvSource({ env }),
  ]

  if (opts.overrides) sources.push(new ObjectSource(opts.overrides))

  const config = await loadConfig({ schema: memoEnvSchema, sources })

  return mapEnvToMemoConfig(config.value)
}
