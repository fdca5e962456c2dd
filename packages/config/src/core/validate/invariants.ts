import type { Invariant } from "../../ports/invariant"
import type { DefaultContext, Value } from "../../ports/node"
import { MissingSelectorError, MutualExclusionError, UnresolvedReferenceError } from "../errors"
import { lastSegment } from "../utils/format"
import { isSet, isValueMap, ownValue } from "../utils/values"

export type MutuallyExclusiveOptions = {
  /** Rendered after "under" in the message. Defaults to the quoted group key. */
  scope?: string
}

/**
 * At most one of `fields` may be set. Pairs are checked in declaration order,
 * so the message names the first conflicting pair.
 */
export function mutuallyExclusive(
  fields: readonly string[],
  options: MutuallyExclusiveOptions = {},
): Invariant {
  return {
    name: "mutually-exclusive",
    reads: fields,
    assert(group, path) {
      const present = fields.filter((field) => isSet(ownValue(group, field)))
      const [first, second] = present

      if (first !== undefined && second !== undefined) {
        throw new MutualExclusionError(path, first, second, options.scope ?? `"${lastSegment(path)}"`)
      }
    },
  }
}

export type SelectorOptions = {
  /** Child naming one entry of `collection`, e.g. "default_bus" */
  selector: string
  /** Map child holding the named entries, e.g. "buses" */
  collection: string
  /** Entry noun used in messages, e.g. "bus" */
  singular: string
  /** Plural entry noun used in messages, e.g. "buses" */
  plural: string
  /** How the selector reads in messages. Defaults to "default <singular>". */
  label?: string
}

function entryNames(value: Value | undefined): string[] {
  return isValueMap(value) ? Object.keys(value) : []
}

/**
 * When the collection has more than one entry the selector must be set.
 */
export function requireSelector(options: SelectorOptions): Invariant {
  return {
    name: "require-selector",
    reads: [options.selector, options.collection],
    assert(group, path) {
      const selected = ownValue(group, options.selector)
      const count = entryNames(ownValue(group, options.collection)).length

      if (count > 1 && (selected === undefined || selected === null)) {
        throw new MissingSelectorError(path, options.selector, options.singular)
      }
    },
  }
}

/**
 * The selector, when set, must name an entry of the collection.
 */
export function selectorReferences(options: SelectorOptions): Invariant {
  return {
    name: "selector-references",
    reads: [options.selector, options.collection],
    assert(group, path) {
      const selected = ownValue(group, options.selector)

      if (selected === undefined || selected === null) return

      const names = entryNames(ownValue(group, options.collection))
      const value = String(selected)

      if (!names.includes(value)) {
        throw new UnresolvedReferenceError(
          path,
          options.selector,
          { selector: options.label ?? `default ${options.singular}`, plural: options.plural },
          value,
          names,
        )
      }
    },
  }
}

/**
 * Default for a selector: the name of the collection's only entry, else null.
 */
export function soleEntryOf(collection: string): (ctx: DefaultContext) => string | null {
  return ({ siblings }: DefaultContext) => {
    const names = entryNames(ownValue(siblings, collection))
    const [only] = names

    return names.length === 1 && only !== undefined ? only : null
  }
}
