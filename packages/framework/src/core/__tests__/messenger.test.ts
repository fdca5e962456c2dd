import { MissingSelectorError, Processor, UnresolvedReferenceError } from "@stratum/config"

import { defaultCapabilities } from "../../ports/capabilities"
import { createFrameworkSchema } from "../framework-schema"

const schema = createFrameworkSchema()
const processor = new Processor({ capabilities: defaultCapabilities })

describe("messenger", () => {
  it("requires a default bus when several buses are configured", () => {
    expect(() =>
      processor.process(schema, [{ messenger: { default_bus: null, buses: { first_bus: {}, second_bus: {} } } }]),
    ).toThrow('You must specify the "default_bus" if you define more than one bus.')
  })

  it("replaces middleware lists instead of merging them", () => {
    const config = processor.process(schema, [
      {
        messenger: {
          default_bus: "existing_bus",
          buses: {
            existing_bus: { middleware: "existing_bus.middleware" },
            common_bus: { default_middleware: false, middleware: "common_bus.old_middleware" },
          },
        },
      },
      {
        messenger: {
          buses: {
            common_bus: { middleware: "common_bus.new_middleware" },
            new_bus: { middleware: "new_bus.middleware" },
          },
        },
      },
    ])

    expect(config.messenger).toMatchObject({
      default_bus: "existing_bus",
      buses: {
        existing_bus: {
          default_middleware: true,
          middleware: [{ id: "existing_bus.middleware", arguments: [] }],
        },
        common_bus: {
          default_middleware: false,
          middleware: [{ id: "common_bus.new_middleware", arguments: [] }],
        },
        new_bus: {
          default_middleware: true,
          middleware: [{ id: "new_bus.middleware", arguments: [] }],
        },
      },
    })
  })

  it("merges a later bus named after an object built-in", () => {
    const result = processor.safeProcess(schema, [
      { messenger: { default_bus: "first_bus", buses: { first_bus: {} } } },
      { messenger: { buses: { constructor: { middleware: "audit" } } } },
    ])

    expect(result.success).toBe(true)
    if (!result.success) return

    expect(result.value.messenger).toHaveProperty(["buses", "first_bus"], { default_middleware: true, middleware: [] })
    expect(result.value.messenger).toHaveProperty(["buses", "constructor"], {
      default_middleware: true,
      middleware: [{ id: "audit", arguments: [] }],
    })
  })

  it("reports the missing selector on the messenger path", () => {
    const result = processor.safeProcess(schema, [{ messenger: { buses: { first_bus: {}, second_bus: {} } } }])

    expect(result.success).toBe(false)
    if (result.success) return

    expect(result.error).toBeInstanceOf(MissingSelectorError)
    expect(result.error.path).toBe("framework.messenger")
  })

  it("rejects a default bus that is not configured", () => {
    expect(() =>
      processor.process(schema, [{ messenger: { default_bus: "foo", buses: { bar: null, baz: null } } }]),
    ).toThrow('The specified default bus "foo" is not configured. Available buses are "bar", "baz".')
  })

  it("rejects a default bus when no buses are configured", () => {
    const result = processor.safeProcess(schema, [{ messenger: { default_bus: "foo" } }])

    expect(result.success).toBe(false)
    if (result.success) return

    expect(result.error).toBeInstanceOf(UnresolvedReferenceError)
    expect(result.error.message).toBe('The specified default bus "foo" is not configured. No buses are configured.')
  })

  it("selects the only configured bus", () => {
    const config = processor.process(schema, [{ messenger: { buses: { command_bus: null } } }])

    expect(config.messenger).toMatchObject({
      default_bus: "command_bus",
      buses: { command_bus: { default_middleware: true, middleware: [] } },
    })
  })

  it("expands middleware with arguments", () => {
    const config = processor.process(schema, [
      {
        messenger: {
          buses: {
            command_bus: {
              middleware: ["validation", { id: "doctrine_transaction", arguments: ["default"] }],
            },
          },
        },
      },
    ])

    expect(config.messenger).toMatchObject({
      buses: {
        command_bus: {
          middleware: [
            { id: "validation", arguments: [] },
            { id: "doctrine_transaction", arguments: ["default"] },
          ],
        },
      },
    })
  })

  it("expands a transport given as a dsn", () => {
    const config = processor.process(schema, [{ messenger: { transports: { async: "amqp://localhost" } } }])

    expect(config.messenger).toMatchObject({
      transports: {
        async: {
          dsn: "amqp://localhost",
          serializer: null,
          options: {},
          failure_transport: null,
          retry_strategy: { service: null, max_retries: 3, delay: 1000, multiplier: 2, max_delay: 0 },
        },
      },
    })
  })

  it("keeps the default bus through a second pass", () => {
    const once = processor.process(schema, [{ secret: "test-secret" }])

    expect(processor.process(schema, [once])).toEqual(once)
  })
})
