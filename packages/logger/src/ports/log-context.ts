/**
 * Well-known fields a logger may be scoped with via `child()`.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  /** Key namespace of the cache store emitting the log. */
  namespace: string
  /** Connection strategy of the store, e.g. `cluster` or `standalone`. */
  mode: string
  address: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
