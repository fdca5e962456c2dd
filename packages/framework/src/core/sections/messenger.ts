import {
  boolean,
  float,
  group,
  integer,
  list,
  map,
  requireSelector,
  selectorReferences,
  soleEntryOf,
  string,
  variable,
} from "@stratum/config"
import { enabledIfStandalone } from "../capability-defaults"

const buses = { selector: "default_bus", collection: "buses", singular: "bus", plural: "buses" }

const middleware = group("middleware", [string("id", { required: true }), list("arguments", variable("argument"))], {
  shorthand: { key: "id", absorbUnknownKeys: false },
})

const bus = group("bus", [
  variable("default_middleware", { default: true, allowedValues: [true, false, "allow_no_handlers"] }),
  // each layer's list replaces the previous one; middleware order matters
  list("middleware", middleware, { merge: "replace" }),
])

const transport = group(
  "transport",
  [
    string("dsn", { required: true }),
    string("serializer", { nullable: true, default: null }),
    map("options", variable("option")),
    string("failure_transport", { nullable: true, default: null }),
    group("retry_strategy", [
      string("service", { nullable: true, default: null }),
      integer("max_retries", { default: 3 }),
      integer("delay", { default: 1000 }),
      float("multiplier", { default: 2 }),
      integer("max_delay", { default: 0 }),
    ]),
  ],
  { shorthand: { key: "dsn", absorbUnknownKeys: false } },
)

export const messenger = group(
  "messenger",
  [
    map("routing", group("route", [list("senders", string("sender"))], { shorthand: { key: "senders", absorbUnknownKeys: false } })),
    group("serializer", [
      string("default_serializer", { default: "messenger.transport.native_serializer" }),
      group("structured_serializer", [string("format", { default: "json" }), map("context", variable("value"))]),
    ]),
    map("transports", transport),
    string("failure_transport", { nullable: true, default: null }),
    boolean("reset_on_message", { nullable: true, default: null }),
    string("default_bus", { nullable: true, default: soleEntryOf("buses") }),
    map("buses", bus, {
      default: { "messenger.bus.default": { default_middleware: true, middleware: [] } },
    }),
  ],
  {
    toggle: { default: enabledIfStandalone("messenger") },
    invariants: [requireSelector(buses), selectorReferences(buses)],
  },
)
