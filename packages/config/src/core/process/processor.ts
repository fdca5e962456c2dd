import { createNullLogger, type Logger } from "@stratum/logger"
import type { CapabilitySet, GroupNode, SchemaNode, Value, ValueMap } from "../../ports/node"
import { applyDefaults } from "../defaults/apply-defaults"
import { type ConfigValidationError, isConfigValidationError, SchemaDefinitionError } from "../errors"
import { mergeLayers } from "../merge/merge"
import { normalize } from "../normalize/normalize"
import { toRaw } from "../normalize/to-raw"
import { joinPath } from "../utils/format"
import { isValueMap } from "../utils/values"
import { validate } from "../validate/validate"

export type Layer = {
  /** Where the document came from, e.g. "json:config.json" */
  readonly name: string
  readonly document: unknown
}

export type ProcessorOptions = {
  capabilities?: CapabilitySet
  logger?: Logger
}

export type ProcessedConfig = {
  readonly value: ValueMap
  /** Dotted path (relative to the root) to the name of the last layer that set it */
  readonly provenance: Readonly<Record<string, string>>
}

export type SafeProcessResult =
  | { readonly success: true; readonly value: ValueMap }
  | { readonly success: false; readonly error: ConfigValidationError }

function forgetBelow(path: string, into: Map<string, string>): void {
  for (const recorded of [...into.keys()]) {
    if (recorded === path || recorded.startsWith(`${path}.`)) into.delete(recorded)
  }
}

/**
 * Records the leaves a layer provided. Lists and scalars are leaves; maps and
 * groups are walked, and an empty one is recorded itself. A map that replaces
 * wholesale first drops what earlier layers recorded beneath it.
 */
function recordProvenance(
  node: SchemaNode,
  value: Value,
  path: string,
  layer: string,
  into: Map<string, string>,
): void {
  if (!isValueMap(value) || node.kind === "scalar" || node.kind === "list") {
    into.set(path, layer)
    return
  }

  if (node.kind === "map" && node.merge === "replace") forgetBelow(path, into)

  const entries = Object.entries(value)

  if (entries.length === 0 && path !== "") into.set(path, layer)

  for (const [key, child] of entries) {
    const childNode = node.kind === "map" ? node.prototype : node.children.find((c) => c.key === key)

    if (childNode) recordProvenance(childNode, child, joinPath(path, key), layer, into)
  }
}

/**
 * Turns ordered configuration layers into one normalized document:
 * normalize each layer, merge them, validate the merged tree, then inject
 * defaults. Pure and synchronous; one instance may serve any number of calls.
 */
export class Processor {
  private readonly capabilities: CapabilitySet
  private readonly logger: Logger

  constructor(options: ProcessorOptions = {}) {
    this.capabilities = Object.freeze({ ...options.capabilities })
    this.logger = (options.logger ?? createNullLogger()).child({ module: "processor" })
  }

  /**
   * @throws ConfigValidationError for the first invalid value, in processing order.
   * @throws SchemaDefinitionError when the schema itself is inconsistent.
   */
  process(schema: GroupNode, documents: readonly unknown[]): ValueMap {
    return this.processLayers(
      schema,
      documents.map((document, i) => ({ name: `layer:${i}`, document })),
    ).value
  }

  safeProcess(schema: GroupNode, documents: readonly unknown[]): SafeProcessResult {
    try {
      return { success: true, value: this.process(schema, documents) }
    } catch (err) {
      if (isConfigValidationError(err)) return { success: false, error: err }
      throw err
    }
  }

  processLayers(schema: GroupNode, layers: readonly Layer[]): ProcessedConfig {
    const root = schema.key
    const provenance = new Map<string, string>()

    try {
      const normalized = layers.map((layer, i) => {
        this.logger.debug("normalizing layer", { layer: i, source: layer.name, path: root })

        const value = normalize(schema, toRaw(layer.document, root), root)

        recordProvenance(schema, value, "", layer.name, provenance)

        return value
      })

      const merged = mergeLayers(schema, normalized, root)

      validate(schema, merged, root)

      const value = applyDefaults(schema, merged, root, this.capabilities)

      if (!isValueMap(value)) {
        throw new SchemaDefinitionError(root, "the root group did not produce a map")
      }

      return { value, provenance: Object.fromEntries(provenance) }
    } catch (err) {
      if (isConfigValidationError(err)) {
        this.logger.warn("invalid configuration", { path: err.path, err })
      }
      throw err
    }
  }
}
