/**
 * A source of one configuration layer.
 *
 * A ConfigSource only *loads* a raw document. Shorthand expansion, merging and
 * validation happen in the processor. Sources are applied in order; later
 * layers override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "env", "dotenv:.env.local", "json:config.json"
   */
  readonly name: string

  /**
   * Load the layer document.
   *
   * - Returning undefined for a key means "value not provided"
   * - Values may be nested maps, lists or scalars in any shorthand form
   */
  load(): Promise<Record<string, unknown>>
}
