import { boolean, group, integer, list, map, string, variable } from "@stratum/config"
import { enabledIfStandalone, has } from "../capability-defaults"

const mapping = group("mapping", [list("paths", string("path"))], { aliases: { path: "paths" } })

export const validation = group(
  "validation",
  [
    variable("cache"),
    boolean("enable_annotations", { default: enabledIfStandalone() }),
    list("static_method", string("method"), { default: ["loadValidatorMetadata"] }),
    string("translation_domain", { default: "validators" }),
    string("email_validation_mode", { allowedValues: ["html5", "loose", "strict"] }),
    mapping,
    group("not_compromised_password", [string("endpoint", { nullable: true, default: null })], {
      toggle: { default: true },
    }),
    map(
      "auto_mapping",
      group("namespace", [list("services", string("service"))], {
        shorthand: { key: "services", absorbUnknownKeys: false },
      }),
    ),
  ],
  { toggle: { default: enabledIfStandalone() } },
)

export const annotations = group(
  "annotations",
  [
    string("cache", { default: "compiled", info: "none, compiled, file, or a cache service id" }),
    string("file_cache_dir", { default: "%kernel.cache_dir%/annotations" }),
    boolean("debug", { default: (ctx) => has(ctx, "debug") }),
  ],
  { toggle: { default: true } },
)

export const serializer = group(
  "serializer",
  [
    boolean("enable_annotations", { default: enabledIfStandalone() }),
    string("name_converter"),
    string("circular_reference_handler"),
    string("max_depth_handler"),
    mapping,
    map("default_context", variable("value")),
  ],
  { toggle: { default: enabledIfStandalone() } },
)

export const propertyAccess = group(
  "property_access",
  [
    boolean("magic_call", { default: false }),
    boolean("magic_get", { default: true }),
    boolean("magic_set", { default: true }),
    boolean("throw_exception_on_invalid_index", { default: false }),
    boolean("throw_exception_on_invalid_property_path", { default: true }),
  ],
  { toggle: { default: true } },
)

export const propertyInfo = group("property_info", [], { toggle: { default: enabledIfStandalone() } })

const transition = group("transition", [
  string("name", { required: true }),
  string("guard"),
  list("from", string("place")),
  list("to", string("place")),
  map("metadata", variable("value")),
])

const workflow = group(
  "workflow",
  [
    string("type", { default: "state_machine", allowedValues: ["workflow", "state_machine"] }),
    group("audit_trail", [], { toggle: { default: false } }),
    group("marking_store", [
      string("type", { allowedValues: ["method"] }),
      string("property"),
      string("service"),
    ]),
    list("supports", string("class")),
    string("support_strategy"),
    list("initial_marking", string("place")),
    list("places", string("place")),
    list("transitions", transition),
    map("metadata", variable("value")),
  ],
  { aliases: { place: "places", transition: "transitions" } },
)

export const workflows = group("workflows", [map("workflows", workflow)], {
  toggle: { default: false },
  shorthand: { key: "workflows", absorbUnknownKeys: true },
})

export const runtimeErrors = group("runtime_errors", [
  variable("log", { default: true, info: "true, false, or an error level bitmask" }),
  boolean("throw", { default: (ctx) => has(ctx, "debug") }),
])

export const secrets = group(
  "secrets",
  [
    string("vault_directory", { default: "%kernel.project_dir%/config/secrets/%kernel.runtime_environment%" }),
    string("local_dotenv_file", { default: "%kernel.project_dir%/.env.%kernel.environment%.local" }),
    string("decryption_env_var", { default: "base64:default::APP_DECRYPTION_SECRET" }),
  ],
  { toggle: { default: true } },
)

export const uid = group(
  "uid",
  [
    integer("default_uuid_version", { default: 6, allowedValues: [6, 4, 1] }),
    integer("name_based_uuid_version", { default: 5, allowedValues: [5, 3] }),
    string("name_based_uuid_namespace"),
    integer("time_based_uuid_version", { default: 6, allowedValues: [6, 1] }),
    string("time_based_uuid_node"),
  ],
  { toggle: { default: enabledIfStandalone("uid") } },
)

const pool = group(
  "pool",
  [
    list("adapters", string("adapter")),
    variable("tags", { nullable: true, default: null }),
    boolean("public", { default: false }),
    string("default_lifetime"),
    string("provider"),
    string("early_expiration_message_bus"),
    string("clearer"),
  ],
  { aliases: { adapter: "adapters" } },
)

export const cache = group("cache", [
  string("prefix_seed", { default: "_%kernel.project_dir%.%kernel.container_class%" }),
  string("app", { default: "cache.adapter.filesystem" }),
  string("system", { default: "cache.adapter.system" }),
  string("directory", { default: "%kernel.cache_dir%/pools/app" }),
  string("default_psr6_provider"),
  string("default_redis_provider", { default: "redis://localhost" }),
  string("default_memcached_provider", { default: "memcached://localhost" }),
  string("default_doctrine_dbal_provider", { default: "database_connection" }),
  string("default_pdo_provider", {
    nullable: true,
    default: (ctx) => (has(ctx, "dbal") ? "database_connection" : null),
  }),
  map("pools", pool),
])

