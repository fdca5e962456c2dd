import type { ConfigSource } from "../../ports/source"
import { nestKeys } from "../utils/nest-keys"

export type EnvSourceOptions = {
  /**
   * Only variables starting with this prefix are read; the prefix is stripped.
   *
   * @example "APP__" reads `APP__SESSION__NAME` as `session.name`
   */
  prefix: string

  /** Separator between nesting levels. @default "__" */
  delimiter?: string

  env?: Record<string, string | undefined>
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly delimiter: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions) {
    this.prefix = options.prefix
    this.delimiter = options.delimiter ?? "__"
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const filtered: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) {
        filtered[key.slice(this.prefix.length)] = value
      }
    }

    return nestKeys(filtered, this.delimiter)
  }
}
