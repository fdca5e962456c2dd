import type { ListNode, SchemaNode, Value, ValueMap } from "../../ports/node"
import { SchemaDefinitionError } from "../errors"
import { joinPath } from "../utils/format"
import { contentKey, isValueMap, ownValue } from "../utils/values"

function expectMap(value: Value, path: string): ValueMap {
  if (!isValueMap(value)) {
    throw new SchemaDefinitionError(path, "normalized value is not a map")
  }

  return value
}

function expectList(value: Value, path: string): Value[] {
  if (!Array.isArray(value)) {
    throw new SchemaDefinitionError(path, "normalized value is not a list")
  }

  return value
}

function identityOf(node: ListNode, item: Value): string {
  const field = node.uniqueBy
  const id = field !== undefined && isValueMap(item) ? ownValue(item, field) : undefined

  return id === undefined || id === null ? `content:${contentKey(item)}` : `field:${contentKey(id)}`
}

function mergeLists(node: ListNode, prev: Value[], next: Value[]): Value[] {
  switch (node.merge) {
    case "replace":
      return next
    case "append":
      return [...prev, ...next]
    case "append-unique": {
      // entries with the same identity collapse onto the last one, at its position
      const byIdentity = new Map<string, Value>()

      for (const item of [...prev, ...next]) {
        const id = identityOf(node, item)

        byIdentity.delete(id)
        byIdentity.set(id, item)
      }

      return [...byIdentity.values()]
    }
  }
}

/**
 * Folds the normalized value of a later layer onto an earlier one.
 */
export function mergeValues(node: SchemaNode, prev: Value | undefined, next: Value, path: string): Value {
  if (prev === undefined) return next

  switch (node.kind) {
    case "scalar":
      return next
    case "list":
      return mergeLists(node, expectList(prev, path), expectList(next, path))
    case "map": {
      const incoming = expectMap(next, path)

      if (node.merge === "replace") return incoming

      const out: ValueMap = { ...expectMap(prev, path) }

      for (const [key, value] of Object.entries(incoming)) {
        out[key] = mergeValues(node.prototype, ownValue(out, key), value, joinPath(path, key))
      }

      return out
    }
    case "group": {
      const out: ValueMap = { ...expectMap(prev, path) }

      for (const [key, value] of Object.entries(expectMap(next, path))) {
        const child = node.children.find((c) => c.key === key)

        if (!child) {
          throw new SchemaDefinitionError(joinPath(path, key), "normalized value has no schema node")
        }
        out[key] = mergeValues(child, ownValue(out, key), value, joinPath(path, key))
      }

      return out
    }
  }
}

/**
 * Folds normalized layers in order; later layers win.
 */
export function mergeLayers(node: SchemaNode, layers: readonly Value[], path: string): Value | undefined {
  let merged: Value | undefined

  for (const layer of layers) {
    merged = mergeValues(node, merged, layer, path)
  }

  return merged
}
