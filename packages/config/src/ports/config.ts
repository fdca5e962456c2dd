import type { ValueMap } from "./node"

/**
 * Normalized configuration together with where its values came from.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: createFrameworkSchema(),
 *   sources: [new JsonSource({ file: "config.json", required: true }), new EnvSource({ prefix: "APP__" })],
 * })
 *
 * config.get("lock")                    // { enabled: true, resources: { default: ["flock"] } }
 * config.explain("session.name")        // "env"
 * config.explain("session.save_path")   // "default"
 * ```
 */
export interface IConfig<T extends ValueMap = ValueMap> {
  /** Full normalized document */
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Names the source that last set a path (dotted, relative to the root), or
   * "default" when no layer provided it.
   */
  explain(path: string): string

  /**
   * Names of the sources that contributed at least one value, in the order
   * they were applied.
   */
  sourcesUsed(): string[]
}
