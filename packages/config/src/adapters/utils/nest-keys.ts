type Tree = { [key: string]: Tree | string }

/**
 * Expands flat keys into nested maps: with delimiter "__",
 * `{ SESSION__NAME: "sid" }` becomes `{ session: { name: "sid" } }`.
 * Keys are lower-cased; undefined values are skipped.
 */
export function nestKeys(
  flat: Readonly<Record<string, string | undefined>>,
  delimiter: string,
): Record<string, unknown> {
  const root: Tree = {}

  for (const [flatKey, value] of Object.entries(flat)) {
    if (value === undefined) continue

    const segments = flatKey.toLowerCase().split(delimiter)
    const leaf = segments.pop()

    if (leaf === undefined || leaf === "" || segments.includes("")) {
      throw new Error(`Cannot read "${flatKey}": empty key segment`)
    }
    if (leaf === "__proto__" || segments.includes("__proto__")) {
      throw new Error(`Cannot read "${flatKey}": reserved key segment`)
    }

    let node = root

    for (const segment of segments) {
      const next = Object.hasOwn(node, segment) ? node[segment] : undefined

      if (next === undefined) {
        const created: Tree = {}

        node[segment] = created
        node = created
      } else if (typeof next === "string") {
        throw new Error(`Cannot nest "${flatKey}" under "${segment}", which already holds a value`)
      } else {
        node = next
      }
    }

    if (Object.hasOwn(node, leaf) && typeof node[leaf] !== "string") {
      throw new Error(`"${flatKey}" conflicts with nested keys under "${leaf}"`)
    }
    node[leaf] = value
  }

  return root
}
