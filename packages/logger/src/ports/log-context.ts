/**
 * Well-known fields a log entry may carry. All are optional at the call site;
 * `child()` binds them once for a scope.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  /** Provenance label of a configuration source, e.g. `toml:config/default.toml` */
  source: string
  /** Dotted configuration path the entry is about */
  path: string

  entries: number
  passes: number
  substitutions: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
