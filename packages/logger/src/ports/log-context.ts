/**
 * Fields a log line can be scoped to.
 *
 * `model` and `column` identify the schema element being defined or resolved;
 * `operation` names the step (`register`, `resolve`, `settings`...).
 */
export type LogContext = {
  service: string
  env: string
  module: string

  model: string
  column: string
  operation: string
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
