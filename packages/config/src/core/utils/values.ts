import type { Value, ValueMap } from "../../ports/node"

export function isValueMap(value: Value | undefined): value is ValueMap {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Reads an own entry only, so keys such as `constructor` never reach `Object.prototype`.
 */
export function ownValue(map: Readonly<ValueMap>, key: string): Value | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined
}

/**
 * A value counts as set when it is not null and, for lists and maps, not empty.
 */
export function isSet(value: Value | undefined): boolean {
  if (value === undefined || value === null) return false
  if (Array.isArray(value)) return value.length > 0
  if (isValueMap(value)) return Object.keys(value).length > 0

  return true
}

function canonical(value: Value): Value {
  if (Array.isArray(value)) return value.map(canonical)
  if (!isValueMap(value)) return value

  const sorted: ValueMap = {}

  for (const key of Object.keys(value).sort()) {
    const entry = value[key]

    if (entry !== undefined) sorted[key] = canonical(entry)
  }

  return sorted
}

/**
 * Serialization that ignores map key order: `{ a, b }` and `{ b, a }` match.
 */
export function contentKey(value: Value): string {
  return JSON.stringify(canonical(value))
}
