import { BaseError, type ErrorContext } from "@stratum/errors"
import type { Scalar } from "../ports/node"
import { quoteList } from "./utils/format"

export type ConfigErrorCode =
  | "config.shape"
  | "config.invalid_type"
  | "config.invalid_value"
  | "config.unrecognized_key"
  | "config.missing_value"
  | "config.mutual_exclusion"
  | "config.missing_selector"
  | "config.unresolved_reference"
  | "config.pattern"
  | "config.schema_definition"
  | "config.source_load"

/**
 * A configuration value supplied by some layer is invalid.
 *
 * `message` holds the cause only; `describe()` prefixes the offending path for
 * display.
 */
export abstract class ConfigValidationError<
  C extends ConfigErrorCode = ConfigErrorCode,
> extends BaseError<C> {
  readonly path: string

  protected constructor(path: string, message: string, code: C, context: ErrorContext = {}) {
    super(message, { code, context: { path, ...context } })
    this.path = path
  }

  describe(): string {
    return `Invalid configuration for path "${this.path}": ${this.message}`
  }
}

export function isConfigValidationError(err: unknown): err is ConfigValidationError {
  return err instanceof ConfigValidationError
}

export class ShapeError extends ConfigValidationError<"config.shape"> {
  constructor(path: string, message: string) {
    super(path, message, "config.shape")
  }
}

export class InvalidTypeError extends ConfigValidationError<"config.invalid_type"> {
  constructor(path: string, expected: string, value: Scalar) {
    super(path, `Expected ${expected}, got ${JSON.stringify(value)}.`, "config.invalid_type", {
      expected,
      value,
    })
  }
}

export class InvalidValueError extends ConfigValidationError<"config.invalid_value"> {
  constructor(path: string, value: Scalar, allowed: readonly Scalar[]) {
    super(
      path,
      `The value ${JSON.stringify(value)} is not allowed. Permissible values: ${allowed.map((v) => JSON.stringify(v)).join(", ")}.`,
      "config.invalid_value",
      { value, allowed },
    )
  }
}

export class UnrecognizedKeyError extends ConfigValidationError<"config.unrecognized_key"> {
  constructor(path: string, key: string, available: readonly string[]) {
    const sorted = [...available].sort()

    super(
      path,
      `Unrecognized option "${key}". Available options are ${quoteList(sorted)}.`,
      "config.unrecognized_key",
      { key, available: sorted },
    )
  }
}

export class MissingValueError extends ConfigValidationError<"config.missing_value"> {
  constructor(path: string, key: string) {
    super(path, `The child config "${key}" must be configured.`, "config.missing_value", { key })
  }
}

export class MutualExclusionError extends ConfigValidationError<"config.mutual_exclusion"> {
  readonly fieldA: string
  readonly fieldB: string
  readonly scope: string

  constructor(path: string, fieldA: string, fieldB: string, scope: string) {
    super(
      path,
      `You cannot use both "${fieldA}" and "${fieldB}" at the same time under ${scope}.`,
      "config.mutual_exclusion",
      { fieldA, fieldB, scope },
    )
    this.fieldA = fieldA
    this.fieldB = fieldB
    this.scope = scope
  }
}

export class MissingSelectorError extends ConfigValidationError<"config.missing_selector"> {
  readonly scope: string

  constructor(path: string, selector: string, singular: string) {
    super(
      path,
      `You must specify the "${selector}" if you define more than one ${singular}.`,
      "config.missing_selector",
      { selector, scope: path },
    )
    this.scope = path
  }
}

export class UnresolvedReferenceError extends ConfigValidationError<"config.unresolved_reference"> {
  readonly selector: string
  readonly availableKeys: readonly string[]

  constructor(
    path: string,
    selector: string,
    label: { readonly selector: string; readonly plural: string },
    value: string,
    available: readonly string[],
  ) {
    const sorted = [...available].sort()
    const tail =
      sorted.length === 0
        ? `No ${label.plural} are configured.`
        : `Available ${label.plural} are ${quoteList(sorted)}.`

    super(
      path,
      `The specified ${label.selector} "${value}" is not configured. ${tail}`,
      "config.unresolved_reference",
      { selector, value, availableKeys: sorted },
    )
    this.selector = selector
    this.availableKeys = sorted
  }
}

export class PatternError extends ConfigValidationError<"config.pattern"> {
  readonly field: string
  readonly value: string

  constructor(path: string, field: string, value: string, message: string) {
    super(path, message, "config.pattern", { field, value })
    this.field = field
    this.value = value
  }
}

/**
 * The schema itself is malformed. A bug in the code defining it, never bad input.
 */
export class SchemaDefinitionError extends BaseError<"config.schema_definition"> {
  readonly path: string

  constructor(path: string, message: string) {
    super(`Invalid schema at "${path}": ${message}`, {
      code: "config.schema_definition",
      context: { path },
      isOperational: false,
    })
    this.path = path
  }
}

export class SourceLoadError extends BaseError<"config.source_load"> {
  readonly source: string

  constructor(source: string, cause: unknown) {
    super(`Failed to load configuration source "${source}"`, {
      code: "config.source_load",
      context: { source },
      cause,
    })
    this.source = source
  }
}
