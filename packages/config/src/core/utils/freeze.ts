/**
 * Freezes `target` and every nested object. Regular expressions and objects
 * that are already frozen are left as they are.
 */
export function deepFreeze<T extends object>(target: T): T {
  for (const value of Object.values(target)) {
    if (typeof value === "object" && value !== null && !(value instanceof RegExp) && !Object.isFrozen(value)) {
      deepFreeze(value)
    }
  }

  return Object.freeze(target)
}
