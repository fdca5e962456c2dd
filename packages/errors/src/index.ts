export { BaseError, serializeError } from "./core/base-error"
export type { BaseErrorOptions, SerializeOptions } from "./core/base-error"
export { isAppError } from "./core/utils/is-app-error"
export type { AppError, ErrorCode, ErrorContext, SerializedError } from "./ports/error"
