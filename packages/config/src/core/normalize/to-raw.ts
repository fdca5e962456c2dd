import type { RawValue } from "../../ports/node"
import { ShapeError } from "../errors"
import { joinPath } from "../utils/format"

function isPlainObject(input: object): boolean {
  const proto: unknown = Object.getPrototypeOf(input)

  return proto === Object.prototype || proto === null
}

function kindOf(input: unknown): string {
  if (typeof input !== "object" || input === null) return typeof input

  return input.constructor?.name ?? "object"
}

/**
 * Converts a parsed layer document into a tagged RawValue.
 *
 * `undefined` map entries are dropped ("not provided"); `undefined` elsewhere
 * reads as null.
 */
export function toRaw(input: unknown, path: string): RawValue {
  if (input === undefined || input === null) {
    return { tag: "scalar", value: null }
  }

  switch (typeof input) {
    case "string":
    case "boolean":
      return { tag: "scalar", value: input }
    case "number":
      if (!Number.isFinite(input)) {
        throw new ShapeError(path, `Expected a finite number, got ${String(input)}.`)
      }
      return { tag: "scalar", value: input }
    case "object":
      break
    default:
      throw new ShapeError(path, `Expected a scalar, list or map, got ${kindOf(input)}.`)
  }

  if (Array.isArray(input)) {
    const items: unknown[] = input

    return { tag: "list", items: items.map((item, i) => toRaw(item, joinPath(path, i))) }
  }

  if (!isPlainObject(input)) {
    throw new ShapeError(path, `Expected a scalar, list or map, got ${kindOf(input)}.`)
  }

  const entries: Array<readonly [string, RawValue]> = []

  for (const [key, value] of Object.entries(input)) {
    if (key === "__proto__") {
      throw new ShapeError(joinPath(path, key), `The key "__proto__" is not allowed.`)
    }
    if (value !== undefined) {
      entries.push([key, toRaw(value, joinPath(path, key))])
    }
  }

  return { tag: "map", entries }
}
