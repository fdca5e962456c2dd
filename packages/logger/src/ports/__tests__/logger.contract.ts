import { layerFields, type LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ source: "json:config.json" })
      const child = parent.child({ layer: 2 })

      child.info("layer loaded")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(layerFields(logs[0])).toEqual({ source: "json:config.json", layer: 2 })
      expect(logs[0]?.payload.msg).toBe("layer loaded")
    })

    it("child() overrides on key conflict", () => {
      const { logger, read } = h.make({ level: "trace" })

      const child = logger.child({ source: "env" }).child({ source: "dotenv:.env" })

      child.info("hello")

      expect(layerFields(read()[0])).toEqual({ source: "dotenv:.env" })
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ module: "processor" })
      const child = parent.child({ path: "framework.lock" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload.module).toBe("processor")
      expect(layerFields(logs[0])).toEqual({})
      expect(logs[1]?.payload.module).toBe("processor")
      expect(layerFields(logs[1])).toEqual({ path: "framework.lock" })
    })

    it("per-call meta overrides context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ path: "framework" }).warn("invalid", { path: "framework.assets" })

      expect(layerFields(read()[0])).toEqual({ path: "framework.assets" })
    })

    it("suppresses entries below the configured level", () => {
      const { logger, read, clear } = h.make({ level: "warn" })

      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])

      clear()

      expect(read()).toEqual([])
    })
  })
}
