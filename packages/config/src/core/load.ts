import { createNullLogger, type Logger } from "@stratum/logger"
import type { IConfig } from "../ports/config"
import type { CapabilitySet, GroupNode } from "../ports/node"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { SourceLoadError } from "./errors"
import { type Layer, Processor } from "./process/processor"

export type LoadConfigOptions = {
  schema: GroupNode
  sources: readonly ConfigSource[]
  capabilities?: CapabilitySet
  logger?: Logger
}

/**
 * Loads every source in order and processes the resulting layers.
 *
 * @throws SourceLoadError when a source cannot be read.
 * @throws ConfigValidationError when the merged configuration is invalid.
 */
export async function loadConfig({
  schema,
  sources,
  capabilities,
  logger = createNullLogger(),
}: LoadConfigOptions): Promise<IConfig> {
  const log = logger.child({ module: "loader" })
  const layers: Layer[] = []

  for (const [i, source] of sources.entries()) {
    let document: Record<string, unknown>

    try {
      document = await source.load()
    } catch (err) {
      log.error("failed to load configuration source", { source: source.name, layer: i, err })
      throw new SourceLoadError(source.name, err)
    }

    log.debug("loaded configuration source", {
      source: source.name,
      layer: i,
      keys: Object.keys(document).length,
    })
    layers.push({ name: source.name, document })
  }

  const processor = new Processor({ logger, ...(capabilities && { capabilities }) })
  const { value, provenance } = processor.processLayers(schema, layers)

  return new Config(
    value,
    provenance,
    sources.map((s) => s.name),
  )
}
