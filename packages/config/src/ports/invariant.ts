import type { ValueMap } from "./node"

/**
 * A rule spanning several children of one group.
 *
 * Invariants run on the merged tree before defaults are injected, so they only
 * see values some layer actually provided.
 */
export interface Invariant {
  /** Short identifier used in logs, e.g. "mutually-exclusive" */
  readonly name: string

  /** Child keys the rule reads; checked against the group when it is defined */
  readonly reads: readonly string[]

  /**
   * Throws a ConfigValidationError when the rule does not hold.
   *
   * @param group - The group's merged, not yet defaulted, values.
   * @param path - Dotted path of the group.
   */
  assert(group: Readonly<ValueMap>, path: string): void
}
