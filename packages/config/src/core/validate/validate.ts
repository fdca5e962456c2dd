import type { SchemaNode, Value } from "../../ports/node"
import { PatternError } from "../errors"
import { joinPath } from "../utils/format"
import { isValueMap, ownValue } from "../utils/values"

/**
 * Walks the merged, not yet defaulted, tree. Children are checked before their
 * group; a group's invariants run in declaration order. The first failure throws.
 */
export function validate(node: SchemaNode, value: Value | undefined, path: string): void {
  if (value === undefined) return

  switch (node.kind) {
    case "scalar":
      if (node.pattern && typeof value === "string" && !node.pattern.regex.test(value)) {
        throw new PatternError(path, node.key, value, node.pattern.message(value))
      }
      return
    case "list":
      if (Array.isArray(value)) {
        value.forEach((item, i) => validate(node.prototype, item, joinPath(path, i)))
      }
      return
    case "map":
      if (isValueMap(value)) {
        for (const [key, entry] of Object.entries(value)) {
          validate(node.prototype, entry, joinPath(path, key))
        }
      }
      return
    case "group":
      if (!isValueMap(value)) return

      for (const child of node.children) {
        validate(child, ownValue(value, child.key), joinPath(path, child.key))
      }
      for (const invariant of node.invariants) {
        invariant.assert(value, path)
      }
  }
}
