import type { LogLevelName } from "./log-level"

/**
 * Logging policy shared by all adapters.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit; entries below it are dropped.
   */
  level: LogLevelName

  /**
   * Human-readable output for local development. Keep it off in production,
   * where JSON lines are expected.
   */
  prettify?: boolean
}
