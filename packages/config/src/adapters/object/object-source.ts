import type { ConfigSource } from "../../ports/source"

export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly obj: Record<string, unknown>,
    name = "overrides",
  ) {
    this.name = `object:${name}`
  }

  async load(): Promise<Record<string, unknown>> {
    return structuredClone(this.obj)
  }
}
