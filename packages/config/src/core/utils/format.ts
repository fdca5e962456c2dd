/** `["a", "b"]` becomes `"a", "b"` */
export function quoteList(values: readonly string[]): string {
  return values.map((v) => `"${v}"`).join(", ")
}

export function joinPath(parent: string, key: string | number): string {
  return parent === "" ? String(key) : `${parent}.${key}`
}

export function lastSegment(path: string): string {
  const i = path.lastIndexOf(".")

  return i === -1 ? path : path.slice(i + 1)
}
