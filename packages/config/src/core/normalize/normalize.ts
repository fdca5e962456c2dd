import type {
  GroupNode,
  ListNode,
  MapNode,
  RawValue,
  ScalarNode,
  SchemaNode,
  Value,
  ValueMap,
} from "../../ports/node"
import {
  InvalidTypeError,
  InvalidValueError,
  PatternError,
  ShapeError,
  UnrecognizedKeyError,
} from "../errors"
import { checkScalar } from "../schema/scalar-types"
import { joinPath } from "../utils/format"

type RawEntries = ReadonlyArray<readonly [string, RawValue]>

const NULL: RawValue = { tag: "scalar", value: null }

function describeRaw(raw: RawValue): string {
  switch (raw.tag) {
    case "scalar":
      return raw.value === null ? "null" : `scalar ${JSON.stringify(raw.value)}`
    case "list":
      return "a list"
    case "map":
      return "a map"
  }
}

function shapeError(path: string, expected: string, raw: RawValue): ShapeError {
  return new ShapeError(path, `Expected ${expected}, got ${describeRaw(raw)}.`)
}

/**
 * Expands one layer's raw value into the canonical shape of `node`.
 *
 * The result is a partial tree: only what the layer provided, with no defaults.
 */
export function normalize(node: SchemaNode, raw: RawValue, path: string): Value {
  switch (node.kind) {
    case "scalar":
      return normalizeScalar(node, raw, path)
    case "list":
      return normalizeList(node, raw, path)
    case "map":
      return normalizeMap(node, raw, path)
    case "group":
      return normalizeGroup(node, raw, path)
  }
}

function normalizeScalar(node: ScalarNode, raw: RawValue, path: string): Value {
  if (raw.tag !== "scalar") {
    throw shapeError(path, "a scalar", raw)
  }

  const checked = checkScalar(node, raw.value)

  if (checked.ok) return checked.value
  if (checked.reason === "value") throw new InvalidValueError(path, raw.value, checked.allowed)

  throw new InvalidTypeError(path, checked.expected, raw.value)
}

function normalizeList(node: ListNode, raw: RawValue, path: string): Value[] {
  switch (raw.tag) {
    case "scalar":
      return raw.value === null ? [] : [normalize(node.prototype, raw, joinPath(path, 0))]
    case "list":
      return raw.items.map((item, i) => normalize(node.prototype, item, joinPath(path, i)))
    case "map":
      // a single object stands for a one-item list of objects
      if (node.prototype.kind === "group") {
        return [normalize(node.prototype, raw, joinPath(path, 0))]
      }
      throw shapeError(path, "a list", raw)
  }
}

function nameOf(entries: RawEntries, nameKey: string): string | undefined {
  const found = entries.find(([key]) => key === nameKey)

  if (!found) return undefined

  const [, name] = found

  return name.tag === "scalar" && typeof name.value === "string" ? name.value : undefined
}

function entryValue(entries: RawEntries, nameKey: string, valueKey: string): RawValue {
  const rest = entries.filter(([key]) => key !== nameKey)
  const [only] = rest

  if (rest.length === 1 && only && only[0] === valueKey) {
    return only[1]
  }

  return { tag: "map", entries: rest }
}

function isNamedItem(item: RawValue, nameKey: string): boolean {
  return item.tag === "map" && nameOf(item.entries, nameKey) !== undefined
}

/**
 * `[{ name: "foo", value: "flock" }, { name: "foo", value: "semaphore" }]`
 * collects into `{ foo: ["flock", "semaphore"] }`. Items without a name go to
 * the default key.
 */
function collectNamedItems(node: MapNode, items: readonly RawValue[], path: string): ValueMap {
  const named = node.namedEntries
  const collected = new Map<string, RawValue[]>()

  for (const [i, item] of items.entries()) {
    let name: string | undefined
    let value: RawValue = item

    if (named && item.tag === "map") {
      name = nameOf(item.entries, named.nameKey)
      if (name !== undefined) value = entryValue(item.entries, named.nameKey, named.valueKey)
    }

    name ??= node.defaultKey

    if (name === undefined) {
      throw shapeError(joinPath(path, i), "a named entry", item)
    }

    const bucket = collected.get(name)

    if (bucket) bucket.push(value)
    else collected.set(name, [value])
  }

  const out: ValueMap = {}

  for (const [name, values] of collected) {
    out[name] = collectEntry(node, name, values, path)
  }

  return out
}

function collectEntry(node: MapNode, name: string, values: readonly RawValue[], path: string): Value {
  const entryPath = joinPath(path, name)

  assertKeyPattern(node, name, path)

  if (node.prototype.kind === "list") {
    const proto = node.prototype

    return values.flatMap((v) => normalizeList(proto, v, entryPath))
  }

  const last = values[values.length - 1]

  return normalize(node.prototype, last ?? NULL, entryPath)
}

function assertKeyPattern(node: MapNode, key: string, path: string): void {
  if (node.keyPattern && !node.keyPattern.regex.test(key)) {
    throw new PatternError(joinPath(path, key), key, key, node.keyPattern.message(key))
  }
}

function normalizeMap(node: MapNode, raw: RawValue, path: string): ValueMap {
  switch (raw.tag) {
    case "scalar":
      if (raw.value === null) return {}
      if (node.defaultKey === undefined) throw shapeError(path, "a map", raw)

      return { [node.defaultKey]: normalize(node.prototype, raw, joinPath(path, node.defaultKey)) }
    case "list": {
      const named = node.namedEntries

      if (named && raw.items.some((item) => isNamedItem(item, named.nameKey))) {
        return collectNamedItems(node, raw.items, path)
      }
      if (node.defaultKey === undefined) throw shapeError(path, "a map", raw)

      return { [node.defaultKey]: normalize(node.prototype, raw, joinPath(path, node.defaultKey)) }
    }
    case "map": {
      const out: ValueMap = {}

      for (const [key, value] of raw.entries) {
        assertKeyPattern(node, key, path)
        out[key] = normalize(node.prototype, value, joinPath(path, key))
      }

      return out
    }
  }
}

function isEnabledFlag(item: RawValue): item is { tag: "map"; entries: RawEntries } {
  if (item.tag !== "map" || item.entries.length !== 1) return false

  const [entry] = item.entries

  return entry !== undefined && entry[0] === "enabled"
}

/**
 * Reduces the toggle shorthands of a group to a map:
 * `null` enables it, a boolean sets `enabled`, and inline `{ enabled }` items
 * are pulled out of a list before the rest is read as the shorthand value.
 */
function unwrapToggle(raw: RawValue): { raw: RawValue; enabled?: RawValue } {
  if (raw.tag === "scalar") {
    if (raw.value === null) return { raw: { tag: "map", entries: [] } }
    if (typeof raw.value === "boolean") return { raw: { tag: "map", entries: [] }, enabled: raw }

    return { raw }
  }

  if (raw.tag === "map") return { raw }

  let enabled: RawValue | undefined
  const rest: RawValue[] = []

  for (const item of raw.items) {
    if (isEnabledFlag(item)) enabled = item.entries[0]?.[1]
    else rest.push(item)
  }

  if (enabled === undefined) return { raw }

  const [only] = rest

  if (rest.length === 0) return { raw: { tag: "map", entries: [] }, enabled }
  if (rest.length === 1 && only && only.tag === "list") return { raw: only, enabled }

  return { raw: { tag: "list", items: rest }, enabled }
}

function dashedToUnderscore(key: string): string {
  return key.replaceAll("-", "_")
}

function resolveChildKey(node: GroupNode, key: string): string | undefined {
  const childKeys = node.children.map((c) => c.key)

  if (childKeys.includes(key)) return key

  if (Object.hasOwn(node.aliases, key)) return node.aliases[key]

  const underscored = dashedToUnderscore(key)

  if (underscored !== key) return resolveChildKey(node, underscored)

  return undefined
}

function groupEntries(node: GroupNode, raw: RawValue, path: string): RawEntries {
  const shorthand = node.shorthand

  if (raw.tag === "map") {
    if (!shorthand?.absorbUnknownKeys) return raw.entries

    const own = raw.entries.filter(([key]) => node.toggle && key === "enabled")
    const other = raw.entries.filter(([key]) => !(node.toggle && key === "enabled"))

    if (other.length === 0 || other.some(([key]) => resolveChildKey(node, key) !== undefined)) {
      return raw.entries
    }

    return [...own, [shorthand.key, { tag: "map", entries: other }]]
  }

  if (raw.tag === "scalar" && raw.value === null) return []

  if (!shorthand) {
    throw shapeError(path, "a map", raw)
  }

  return [[shorthand.key, raw]]
}

function normalizeGroup(node: GroupNode, raw: RawValue, path: string): ValueMap {
  const toggled = node.toggle ? unwrapToggle(raw) : { raw }
  const entries = groupEntries(node, toggled.raw, path)
  const out: ValueMap = {}
  const sourceKeys = new Map<string, string>()

  for (const [key, value] of entries) {
    const childKey = resolveChildKey(node, key)

    if (childKey === undefined) {
      if (node.ignoreExtraKeys) continue

      throw new UnrecognizedKeyError(
        path,
        key,
        node.children.map((c) => c.key),
      )
    }

    const previous = sourceKeys.get(childKey)

    if (previous !== undefined) {
      throw new ShapeError(
        joinPath(path, childKey),
        `"${previous}" and "${key}" both set "${childKey}"; use only one of them.`,
      )
    }
    sourceKeys.set(childKey, key)

    const child = node.children.find((c) => c.key === childKey)

    if (child) {
      out[childKey] = normalize(child, value, joinPath(path, childKey))
    }
  }

  if (node.toggle) {
    const enabledNode = node.children.find((c) => c.key === "enabled")

    if (toggled.enabled && enabledNode) {
      out.enabled = normalize(enabledNode, toggled.enabled, joinPath(path, "enabled"))
    } else if (!("enabled" in out)) {
      out.enabled = true
    }
  }

  return out
}
