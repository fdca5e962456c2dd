export type LogContext = {
  service: string
  module: string
  env: string

  /** Name of the configuration source a layer came from, e.g. "json:config.json" */
  source: string
  /** Position of the layer in the merge sequence */
  layer: number
  /** Dotted path of the configuration node being processed */
  path: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by child().
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
