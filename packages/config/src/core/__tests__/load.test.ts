import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DotenvSource } from "../../adapters/dotenv/dotenv-source"
import { EnvSource } from "../../adapters/env/env-source"
import { JsonSource } from "../../adapters/json/json-source"
import { ObjectSource } from "../../adapters/object/object-source"
import type { ConfigSource } from "../../ports/source"
import { SourceLoadError } from "../errors"
import { loadConfig } from "../load"
import { boolean, defineSchema, group, integer, list, map, string } from "../schema/builder"
import { captureLogger } from "./capture-logger"

const schema = defineSchema(
  group("framework", [
    string("secret"),
    string("default_locale", { default: "en" }),
    group(
      "session",
      [string("name", { nullable: true }), integer("gc_probability", { default: 1 })],
      { toggle: { default: false } },
    ),
    group("lock", [map("resources", list("stores", string("store")), { defaultKey: "default" })], {
      toggle: { default: true },
      shorthand: { key: "resources", absorbUnknownKeys: true },
    }),
    boolean("debug", { default: false }),
  ]),
)

describe("loadConfig", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "load-config-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("layers file, dotenv and environment sources", async () => {
    await fs.writeFile(path.join(cwd, "config.json"), JSON.stringify({ secret: "test-secret", lock: "flock" }))
    await fs.writeFile(path.join(cwd, ".env"), "SESSION__GC_PROBABILITY=10\nDEBUG=true\n")

    const config = await loadConfig({
      schema,
      sources: [
        new JsonSource({ file: "config.json", required: true, cwd }),
        new DotenvSource({ file: ".env", required: true, cwd }),
        new EnvSource({ prefix: "APP__", env: { APP__SESSION__NAME: "sid" } }),
        new DotenvSource({ file: ".env.local", required: false, cwd }),
      ],
    })

    expect(config.value).toEqual({
      secret: "test-secret",
      default_locale: "en",
      session: { enabled: true, name: "sid", gc_probability: 10 },
      lock: { enabled: true, resources: { default: ["flock"] } },
      debug: true,
    })
    expect(config.explain("session.name")).toBe("env")
    expect(config.explain("session.gc_probability")).toBe("dotenv:.env")
    expect(config.explain("lock.resources.default")).toBe("json:config.json")
    expect(config.explain("default_locale")).toBe("default")
    expect(config.sourcesUsed()).toEqual(["json:config.json", "dotenv:.env", "env"])
  })

  it("passes capabilities to the processor", async () => {
    const gated = defineSchema(group("framework", [group("uid", [], { toggle: { default: ({ capabilities }) => capabilities.uid === true } })]))

    const config = await loadConfig({ schema: gated, sources: [], capabilities: { uid: true } })

    expect(config.value).toEqual({ uid: { enabled: true } })
  })

  it("wraps a failing source", async () => {
    const { logger, lines } = captureLogger()

    const err = await loadConfig({
      schema,
      sources: [new JsonSource({ file: "missing.json", required: true, cwd })],
      logger,
    }).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(SourceLoadError)
    expect(err).toMatchObject({
      message: 'Failed to load configuration source "json:missing.json"',
      code: "config.source_load",
      source: "json:missing.json",
    })
    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      level: 50,
      msg: "failed to load configuration source",
      module: "loader",
      source: "json:missing.json",
      layer: 0,
    })
  })

  it("logs every loaded source", async () => {
    const { logger, lines } = captureLogger()
    const source: ConfigSource = { name: "object:inline", load: async () => ({ debug: true, secret: "test-secret" }) }

    await loadConfig({ schema, sources: [source, new ObjectSource({}, "empty")], logger })

    const loaded = lines.filter((l) => l.msg === "loaded configuration source")

    expect(loaded.map((l) => [l.source, l.keys])).toEqual([
      ["object:inline", 2],
      ["object:empty", 0],
    ])
  })

  it("rejects invalid configuration", async () => {
    await expect(
      loadConfig({ schema, sources: [new ObjectSource({ session: { gc_probability: "often" } })] }),
    ).rejects.toThrow('Expected an integer, got "often".')
  })
})
