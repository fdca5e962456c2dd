import { boolean, float, group, integer, list, map, mutuallyExclusive, string, variable } from "@stratum/config"
import { enabledIfStandalone } from "../capability-defaults"

const scopedClient = group("scoped_client", [
  string("scope"),
  string("base_uri"),
  string("auth_basic"),
  string("auth_bearer"),
  map("headers", string("value")),
  map("query", string("value")),
  integer("max_redirects"),
  string("http_version"),
  float("timeout"),
])

export const httpClient = group(
  "http_client",
  [integer("max_host_connections"), map("scoped_clients", scopedClient)],
  { toggle: { default: enabledIfStandalone("httpClient") } },
)

export const mailer = group(
  "mailer",
  [
    string("message_bus", { nullable: true, default: null }),
    string("dsn", { nullable: true, default: null }),
    map("transports", string("dsn")),
    map("headers", variable("value")),
  ],
  {
    toggle: { default: enabledIfStandalone("mailer") },
    invariants: [mutuallyExclusive(["dsn", "transports"])],
  },
)

const adminRecipient = group("admin_recipient", [
  string("email", { required: true }),
  string("phone", { default: "" }),
])

export const notifier = group(
  "notifier",
  [
    map("chatter_transports", string("dsn")),
    map("texter_transports", string("dsn")),
    boolean("notification_on_failed_messages", { default: false }),
    map("channel_policy", list("channels", string("channel"))),
    list("admin_recipients", adminRecipient),
  ],
  { toggle: { default: enabledIfStandalone("notifier") } },
)

const limiter = group("limiter", [
  string("lock_factory", { default: "lock.factory" }),
  string("cache_pool", { default: "cache.rate_limiter" }),
  string("storage_service"),
  string("policy", { required: true, allowedValues: ["fixed_window", "token_bucket", "sliding_window", "no_limit"] }),
  integer("limit"),
  string("interval"),
  group("rate", [string("interval"), integer("amount", { default: 1 })]),
])

export const rateLimiter = group("rate_limiter", [map("limiters", limiter)], {
  toggle: { default: enabledIfStandalone("rateLimiter") },
  shorthand: { key: "limiters", absorbUnknownKeys: true },
})
