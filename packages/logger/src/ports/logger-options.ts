import type { LogLevelName } from "./log-level"

/**
 * Logging policy shared by every adapter.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit. "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Pretty-print output for local development. Structured JSON otherwise.
   */
  prettify?: boolean
}
