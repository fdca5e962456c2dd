import fs from "node:fs/promises"
import path from "node:path"
import type { ConfigSource } from "../../ports/source"

/**
 * Options for creating a JSON configuration source.
 */
export type JsonSourceOptions = {
  /**
   * Path to the JSON file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "config.json", "./config/framework.json"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Throws if file not found.
   * - `false`: Returns an empty layer if file not found.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${this.opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)
    let content: string

    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isMissingFile(err)) {
        return {}
      }
      throw err
    }

    const parsed: unknown = JSON.parse(content)

    if (!isRecord(parsed)) {
      throw new Error(`${this.opts.file} must contain a JSON object`)
    }

    return parsed
  }
}
