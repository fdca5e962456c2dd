/**
 * Error codes are lowercase and dot-namespaced by the package that raises them,
 * e.g. `config.mutual_exclusion`.
 */
export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (offending path, value, source name).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /** `true` if retrying might succeed */
  readonly isRetryable: boolean

  /**
   * Whether this is an expected failure caused by input (true) or a programmer
   * error in the code raising it (false).
   *
   * @remarks
   * - Operational (`true`): a configuration value that fails validation, a missing file.
   * - Non-operational (`false`): a malformed schema definition, an invariant broken by the library.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logs and CLI output. JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
