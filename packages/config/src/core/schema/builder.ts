import type { Invariant } from "../../ports/invariant"
import type {
  DefaultSpec,
  GroupNode,
  ListMergePolicy,
  ListNode,
  MapMergePolicy,
  MapNode,
  NamedEntries,
  PatternRule,
  Scalar,
  ScalarNode,
  ScalarType,
  SchemaNode,
  Shorthand,
  Value,
  ValueMap,
} from "../../ports/node"
import { SchemaDefinitionError } from "../errors"
import { deepFreeze } from "../utils/freeze"
import { checkScalar } from "./scalar-types"

type CommonOptions = {
  info?: string
  required?: boolean
}

export type ScalarOptions = CommonOptions & {
  default?: DefaultSpec<Scalar>
  nullable?: boolean
  allowedValues?: readonly Scalar[]
  pattern?: PatternRule
}

export type ListOptions = CommonOptions & {
  default?: DefaultSpec<Value[]>
  merge?: ListMergePolicy
  /** With `append-unique`, the group child that identifies an entry */
  uniqueBy?: string
}

export type MapOptions = CommonOptions & {
  default?: DefaultSpec<ValueMap>
  merge?: MapMergePolicy
  defaultKey?: string
  namedEntries?: NamedEntries
  keyPattern?: PatternRule
}

export type GroupOptions = CommonOptions & {
  /** Adds an `enabled` flag and the null/boolean shorthand that sets it */
  toggle?: { default: DefaultSpec<boolean> }
  shorthand?: { key: string; absorbUnknownKeys?: boolean }
  aliases?: Record<string, string>
  invariants?: readonly Invariant[]
  ignoreExtraKeys?: boolean
}

export function scalar(key: string, type: ScalarType, options: ScalarOptions = {}): ScalarNode {
  const node: ScalarNode = {
    kind: "scalar",
    key,
    type,
    required: options.required ?? false,
    nullable: options.nullable ?? false,
    ...(options.info !== undefined && { info: options.info }),
    ...(options.default !== undefined && { default: options.default }),
    ...(options.allowedValues !== undefined && { allowedValues: options.allowedValues }),
    ...(options.pattern !== undefined && { pattern: options.pattern }),
  }

  const fallback = node.default

  if (fallback !== undefined && typeof fallback !== "function") {
    const checked = checkScalar(node, fallback)

    if (!checked.ok) {
      throw new SchemaDefinitionError(key, `default ${JSON.stringify(fallback)} is not a valid ${type}`)
    }
    if (typeof fallback === "string" && node.pattern && !node.pattern.regex.test(fallback)) {
      throw new SchemaDefinitionError(key, `default "${fallback}" does not match its pattern`)
    }
  }

  return node
}

export const string = (key: string, options?: ScalarOptions) => scalar(key, "string", options)

export const boolean = (key: string, options?: ScalarOptions) => scalar(key, "boolean", options)

export const integer = (key: string, options?: ScalarOptions) => scalar(key, "integer", options)

export const float = (key: string, options?: ScalarOptions) => scalar(key, "float", options)

export const variable = (key: string, options?: ScalarOptions) => scalar(key, "variable", options)

export function list(key: string, prototype: SchemaNode, options: ListOptions = {}): ListNode {
  const { uniqueBy } = options
  const merge = options.merge ?? "replace"

  if (uniqueBy !== undefined) {
    if (merge !== "append-unique") {
      throw new SchemaDefinitionError(key, `uniqueBy needs the "append-unique" merge policy, got "${merge}"`)
    }
    if (prototype.kind !== "group" || !prototype.children.some((c) => c.key === uniqueBy)) {
      throw new SchemaDefinitionError(key, `uniqueBy "${uniqueBy}" is not a child of the item group`)
    }
  }

  return {
    kind: "list",
    key,
    prototype,
    merge,
    required: options.required ?? false,
    ...(options.info !== undefined && { info: options.info }),
    ...(options.default !== undefined && { default: options.default }),
    ...(uniqueBy !== undefined && { uniqueBy }),
  }
}

export function map(key: string, prototype: SchemaNode, options: MapOptions = {}): MapNode {
  const { defaultKey, keyPattern } = options

  if (defaultKey !== undefined && keyPattern && !keyPattern.regex.test(defaultKey)) {
    throw new SchemaDefinitionError(key, `default key "${defaultKey}" does not match the key pattern`)
  }

  return {
    kind: "map",
    key,
    prototype,
    merge: options.merge ?? "merge",
    required: options.required ?? false,
    ...(options.info !== undefined && { info: options.info }),
    ...(options.default !== undefined && { default: options.default }),
    ...(defaultKey !== undefined && { defaultKey }),
    ...(options.namedEntries !== undefined && { namedEntries: options.namedEntries }),
    ...(keyPattern !== undefined && { keyPattern }),
  }
}

function assertUniqueKeys(key: string, children: readonly SchemaNode[]): void {
  const seen = new Set<string>()

  for (const child of children) {
    if (seen.has(child.key)) {
      throw new SchemaDefinitionError(key, `duplicate child "${child.key}"`)
    }
    seen.add(child.key)
  }
}

export function group(
  key: string,
  children: readonly SchemaNode[],
  options: GroupOptions = {},
): GroupNode {
  const { toggle } = options

  if (toggle && children.some((c) => c.key === "enabled")) {
    throw new SchemaDefinitionError(key, `a toggled group cannot declare its own "enabled" child`)
  }

  const all = toggle ? [boolean("enabled", { default: toggle.default }), ...children] : children

  assertUniqueKeys(key, all)

  const childKeys = new Set(all.map((c) => c.key))
  const aliases = options.aliases ?? {}

  for (const [alias, target] of Object.entries(aliases)) {
    if (childKeys.has(alias)) {
      throw new SchemaDefinitionError(key, `alias "${alias}" shadows a child`)
    }
    if (!childKeys.has(target)) {
      throw new SchemaDefinitionError(key, `alias "${alias}" points at unknown child "${target}"`)
    }
  }

  let shorthand: Shorthand | undefined

  if (options.shorthand) {
    if (!childKeys.has(options.shorthand.key)) {
      throw new SchemaDefinitionError(key, `shorthand target "${options.shorthand.key}" is not a child`)
    }
    shorthand = {
      key: options.shorthand.key,
      absorbUnknownKeys: options.shorthand.absorbUnknownKeys ?? false,
    }
  }

  const invariants = options.invariants ?? []

  for (const invariant of invariants) {
    const missing = invariant.reads.find((field) => !childKeys.has(field))

    if (missing !== undefined) {
      throw new SchemaDefinitionError(key, `invariant "${invariant.name}" reads unknown child "${missing}"`)
    }
  }

  return {
    kind: "group",
    key,
    children: all,
    toggle: toggle !== undefined,
    aliases,
    invariants,
    ignoreExtraKeys: options.ignoreExtraKeys ?? false,
    required: options.required ?? false,
    ...(options.info !== undefined && { info: options.info }),
    ...(shorthand !== undefined && { shorthand }),
  }
}

/**
 * Marks a group as the root of a schema. The tree is frozen so it can be
 * shared by every processing call.
 */
export function defineSchema(root: SchemaNode): GroupNode {
  if (root.kind !== "group") {
    throw new SchemaDefinitionError(root.key, `the root node must be a group, got a ${root.kind}`)
  }

  return deepFreeze(root)
}
