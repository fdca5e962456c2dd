export { DotenvSource } from "./adapters/dotenv/dotenv-source"
export type { DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource } from "./adapters/env/env-source"
export type { EnvSourceOptions } from "./adapters/env/env-source"
export { JsonSource } from "./adapters/json/json-source"
export type { JsonSourceOptions } from "./adapters/json/json-source"
export { ObjectSource } from "./adapters/object/object-source"
export { Config } from "./core/config"
export {
  ConfigValidationError,
  InvalidTypeError,
  InvalidValueError,
  isConfigValidationError,
  MissingSelectorError,
  MissingValueError,
  MutualExclusionError,
  PatternError,
  SchemaDefinitionError,
  ShapeError,
  SourceLoadError,
  UnrecognizedKeyError,
  UnresolvedReferenceError,
} from "./core/errors"
export type { ConfigErrorCode } from "./core/errors"
export { loadConfig } from "./core/load"
export type { LoadConfigOptions } from "./core/load"
export { Processor } from "./core/process/processor"
export type {
  Layer,
  ProcessedConfig,
  ProcessorOptions,
  SafeProcessResult,
} from "./core/process/processor"
export {
  boolean,
  defineSchema,
  float,
  group,
  integer,
  list,
  map,
  scalar,
  string,
  variable,
} from "./core/schema/builder"
export type { GroupOptions, ListOptions, MapOptions, ScalarOptions } from "./core/schema/builder"
export {
  mutuallyExclusive,
  requireSelector,
  selectorReferences,
  soleEntryOf,
} from "./core/validate/invariants"
export type { MutuallyExclusiveOptions, SelectorOptions } from "./core/validate/invariants"
export type { IConfig } from "./ports/config"
export type { Invariant } from "./ports/invariant"
export type * from "./ports/node"
export type { ConfigSource } from "./ports/source"
