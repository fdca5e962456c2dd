import type { Invariant } from "./invariant"

export type Scalar = string | number | boolean | null

export type Value = Scalar | Value[] | ValueMap

export type ValueMap = { [key: string]: Value }

/**
 * Raw layer input after it has been checked for shape, tagged so normalization
 * dispatches on the tag instead of probing runtime types.
 */
export type RawValue =
  | { readonly tag: "scalar"; readonly value: Scalar }
  | { readonly tag: "list"; readonly items: readonly RawValue[] }
  | { readonly tag: "map"; readonly entries: ReadonlyArray<readonly [string, RawValue]> }

/**
 * Features the host reports as installed, e.g. `{ semaphoreLock: true }`.
 * Passed to the processor explicitly; defaults never probe the environment.
 */
export type CapabilitySet = Readonly<Record<string, boolean>>

export type DefaultContext = {
  readonly capabilities: CapabilitySet
  /** Values of the enclosing group after its static defaults were applied */
  readonly siblings: Readonly<ValueMap>
}

/**
 * A default is either a canonical value or a pure function of the capability
 * set and the group's other values. Function defaults run after static ones.
 */
export type DefaultSpec<T extends Value = Value> = T | ((ctx: DefaultContext) => T)

export type ScalarType = "string" | "boolean" | "integer" | "float" | "variable"

export type PatternRule = {
  readonly regex: RegExp
  readonly message: (value: string) => string
}

export type ListMergePolicy = "replace" | "append" | "append-unique"

export type MapMergePolicy = "merge" | "replace"

type NodeBase = {
  readonly key: string
  readonly info?: string
  readonly required: boolean
}

export type ScalarNode = NodeBase & {
  readonly kind: "scalar"
  readonly type: ScalarType
  readonly nullable: boolean
  readonly default?: DefaultSpec<Scalar>
  readonly allowedValues?: readonly Scalar[]
  readonly pattern?: PatternRule
}

export type ListNode = NodeBase & {
  readonly kind: "list"
  readonly prototype: SchemaNode
  readonly merge: ListMergePolicy
  readonly default?: DefaultSpec<Value[]>
  /** Group child whose value identifies an entry under `append-unique` */
  readonly uniqueBy?: string
}

export type NamedEntries = {
  /** Key holding the entry name, e.g. `name` in `{ name: "foo", value: "flock" }` */
  readonly nameKey: string
  /** Key holding the entry value; the rest of the item is used when absent */
  readonly valueKey: string
}

export type MapNode = NodeBase & {
  readonly kind: "map"
  readonly prototype: SchemaNode
  readonly merge: MapMergePolicy
  readonly default?: DefaultSpec<ValueMap>
  /** Entry that receives scalar and list shorthand */
  readonly defaultKey?: string
  /** Accept a list of named items; repeated names collect their values */
  readonly namedEntries?: NamedEntries
  readonly keyPattern?: PatternRule
}

export type Shorthand = {
  /** Child receiving a bare scalar or list given for the group */
  readonly key: string
  /** Also route a map with no recognised key to `key` */
  readonly absorbUnknownKeys: boolean
}

export type GroupNode = NodeBase & {
  readonly kind: "group"
  readonly children: readonly SchemaNode[]
  /** Set when the group carries a generated `enabled` child */
  readonly toggle: boolean
  readonly shorthand?: Shorthand
  /** Alternate spellings of child keys, e.g. `{ resource: "resources" }` */
  readonly aliases: Readonly<Record<string, string>>
  readonly invariants: readonly Invariant[]
  readonly ignoreExtraKeys: boolean
}

export type SchemaNode = ScalarNode | ListNode | MapNode | GroupNode

export type NodeKind = SchemaNode["kind"]
