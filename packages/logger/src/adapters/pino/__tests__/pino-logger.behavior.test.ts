import { Writable } from "node:stream"
import { describe, expect, it } from "vitest"

import { createPinoLogger, PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("emits JSON with bound context to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { module: "loader" })

    logger.info("layer loaded", { source: "env", layer: 1 })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0]!)

    expect(payload).toMatchObject({
      msg: "layer loaded",
      module: "loader",
      source: "env",
      layer: 1,
      level: 30,
    })
    expect(typeof payload.time).toBe("number")
  })

  it("serializes err with its cause", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination }, { level: "info" })
    const cause = new Error("ENOENT")

    logger.error("cannot read layer", { err: new Error("source failed", { cause }) })

    const payload = JSON.parse(lines[0]!)

    expect(payload.err.type).toBe("Error")
    expect(payload.err.message).toBe("source failed")
    expect(payload.err.cause.message).toBe("ENOENT")
  })

  it("child() shares the parent's sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { service: "api" })
    const child = base.child({ path: "framework.messenger" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0]!)).toMatchObject({
      msg: "logged",
      service: "api",
      path: "framework.messenger",
    })
  })
})
