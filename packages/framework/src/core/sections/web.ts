import { boolean, group, integer, list, map, string, variable } from "@stratum/config"
import { enabledIfStandalone } from "../capability-defaults"

export const csrfProtection = group("csrf_protection", [], { toggle: { default: false } })

export const form = group(
  "form",
  [
    group("csrf_protection", [
      // null defers to the top-level csrf_protection flag
      boolean("enabled", { nullable: true, default: null }),
      string("field_name", { default: "_token" }),
    ]),
    boolean("legacy_error_messages", { default: true }),
  ],
  { toggle: { default: enabledIfStandalone() } },
)

export const esi = group("esi", [], { toggle: { default: false } })

export const ssi = group("ssi", [], { toggle: { default: false } })

export const fragments = group(
  "fragments",
  [
    string("hinclude_default_template", { nullable: true, default: null }),
    string("path", { default: "/_fragment" }),
  ],
  { toggle: { default: false } },
)

export const profiler = group(
  "profiler",
  [
    boolean("collect", { default: true }),
    string("collect_parameter", { nullable: true, default: null, info: "query parameter that enables collection per request" }),
    boolean("only_exceptions", { default: false }),
    boolean("only_main_requests", { default: false }),
    boolean("only_master_requests", { default: false }),
    string("dsn", { default: "file:%kernel.cache_dir%/profiler" }),
  ],
  { toggle: { default: false } },
)

export const router = group(
  "router",
  [
    string("resource"),
    string("type"),
    string("default_uri", { nullable: true, default: null }),
    integer("http_port", { default: 80 }),
    integer("https_port", { default: 443 }),
    variable("strict_requirements", { nullable: true, default: true }),
    boolean("utf8", { nullable: true, default: null }),
  ],
  { toggle: { default: false } },
)

export const request = group("request", [map("formats", list("mime_types", string("mime_type")))], {
  toggle: { default: false },
})

export const httpCache = group(
  "http_cache",
  [
    variable("debug", { default: "%kernel.debug%" }),
    string("trace_level", { allowedValues: ["none", "short", "full"] }),
    string("trace_header"),
    integer("default_ttl"),
    list("private_headers", string("header")),
    boolean("allow_reload"),
    boolean("allow_revalidate"),
    integer("stale_while_revalidate"),
    integer("stale_if_error"),
  ],
  { toggle: { default: false } },
)

export const webLink = group("web_link", [], { toggle: { default: enabledIfStandalone() } })

export const exceptions = map(
  "exceptions",
  group("exception", [
    string("log_level", {
      nullable: true,
      default: null,
      allowedValues: ["emergency", "alert", "critical", "error", "warning", "notice", "info", "debug"],
    }),
    integer("status_code", { nullable: true, default: null }),
  ]),
)
