import type { IConfig } from "../ports/config"
import type { ValueMap } from "../ports/node"
import { deepFreeze } from "./utils/freeze"

export class Config<T extends ValueMap = ValueMap> implements IConfig<T> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly sources: readonly string[],
  ) {
    deepFreeze(this.data)
  }

  get value(): Readonly<T> {
    return this.data
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }

  explain(path: string): string {
    let current = path

    // a list or an emptied map is recorded as a whole; look up its ancestors
    while (current !== "") {
      if (Object.hasOwn(this.provenance, current)) {
        const source = this.provenance[current]

        if (source !== undefined) return source
      }

      const cut = current.lastIndexOf(".")

      current = cut === -1 ? "" : current.slice(0, cut)
    }

    return "default"
  }

  sourcesUsed(): string[] {
    const used = new Set(Object.values(this.provenance))

    return this.sources.filter((name) => used.has(name))
  }
}
