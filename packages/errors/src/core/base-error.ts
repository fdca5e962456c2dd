import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

function causeOf(err: Error): unknown {
  return "cause" in err ? err.cause : undefined
}

/**
 * Serialize any thrown value to a consistent shape.
 *
 * BaseError keeps its code and context. A plain Error gets code `unknown` and is
 * reported as non-operational, as is any non-Error value (wrapped in `context.value`).
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof BaseError) {
    const cause = causeOf(err)

    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(cause !== undefined && { cause: serializeError(cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    const cause = causeOf(err)

    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(cause !== undefined && { cause: serializeError(cause, options) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
