/**
 * Fields a memoization layer attaches to its log entries.
 *
 * `fn` is the identity prefix of the memoized callable and `key` the cache
 * key a call resolved to.
 */
export type LogContext = {
  service: string
  env: string
  module: string

  fn: string
  key: string
  backend: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
