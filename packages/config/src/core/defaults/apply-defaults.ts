import type {
  CapabilitySet,
  DefaultContext,
  DefaultSpec,
  GroupNode,
  SchemaNode,
  Value,
  ValueMap,
} from "../../ports/node"
import { MissingValueError } from "../errors"
import { joinPath } from "../utils/format"
import { isValueMap, ownValue } from "../utils/values"

type Resolved = { readonly value: Value } | undefined

function isDerived(spec: DefaultSpec): spec is (ctx: DefaultContext) => Value {
  return typeof spec === "function"
}

/**
 * Fills every unset node with its default. Returns undefined for a node that
 * is unset and declares no default; such keys are left out of the document.
 */
export function applyDefaults(
  node: SchemaNode,
  value: Value | undefined,
  path: string,
  capabilities: CapabilitySet,
): Value | undefined {
  switch (node.kind) {
    case "scalar":
      return value
    case "list": {
      const items = Array.isArray(value) ? value : []

      return items.map((item, i) => applyDefaults(node.prototype, item, joinPath(path, i), capabilities) ?? null)
    }
    case "map": {
      const entries = isValueMap(value) ? value : {}
      const out: ValueMap = {}

      for (const [key, entry] of Object.entries(entries)) {
        const filled = applyDefaults(node.prototype, entry, joinPath(path, key), capabilities)

        if (filled !== undefined) out[key] = filled
      }

      return out
    }
    case "group":
      return applyGroupDefaults(node, isValueMap(value) ? value : {}, path, capabilities)
  }
}

function staticDefault(node: SchemaNode): Resolved {
  if (node.kind === "group" || node.default === undefined || isDerived(node.default)) return undefined

  return { value: structuredClone(node.default) }
}

function applyGroupDefaults(
  node: GroupNode,
  provided: Readonly<ValueMap>,
  path: string,
  capabilities: CapabilitySet,
): ValueMap {
  const filled = new Map<string, Value>()
  const deferred: SchemaNode[] = []

  const fill = (child: SchemaNode, value: Value | undefined) => {
    const childPath = joinPath(path, child.key)

    if (value === undefined && child.required) {
      throw new MissingValueError(path, child.key)
    }

    const result = applyDefaults(child, value, childPath, capabilities)

    if (result !== undefined) filled.set(child.key, result)
  }

  for (const child of node.children) {
    const given = ownValue(provided, child.key)

    if (given !== undefined) {
      fill(child, given)
      continue
    }

    if (child.kind !== "group" && child.default !== undefined && isDerived(child.default)) {
      deferred.push(child)
      continue
    }

    fill(child, staticDefault(child)?.value)
  }

  for (const child of deferred) {
    if (child.kind === "group" || child.default === undefined || !isDerived(child.default)) continue

    const siblings = Object.fromEntries(filled)

    fill(child, child.default({ capabilities, siblings }))
  }

  const out: ValueMap = {}

  for (const child of node.children) {
    const value = filled.get(child.key)

    if (value !== undefined) out[child.key] = value
  }

  return out
}
