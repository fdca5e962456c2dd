import { boolean, group, integer, string, variable } from "@stratum/config"

/**
 * Characters a query-string parser would rewrite in a cookie name.
 */
const SESSION_NAME = /^[^.[\]=+]*$/

export const session = group(
  "session",
  [
    string("storage_id", { default: "session.storage.native" }),
    string("storage_factory_id", { nullable: true, default: null }),
    string("handler_id", { nullable: true, default: "session.handler.native_file" }),
    string("name", {
      nullable: true,
      pattern: {
        regex: SESSION_NAME,
        message: (value) => `Session name "${value}" contains illegal character(s).`,
      },
    }),
    integer("cookie_lifetime"),
    string("cookie_path"),
    string("cookie_domain"),
    variable("cookie_secure", { allowedValues: [true, false, "auto"] }),
    boolean("cookie_httponly", { default: true }),
    string("cookie_samesite", {
      nullable: true,
      default: null,
      allowedValues: ["lax", "strict", "none"],
    }),
    boolean("use_cookies"),
    integer("gc_divisor"),
    integer("gc_probability", { default: 1 }),
    integer("gc_maxlifetime"),
    string("save_path", { default: "%kernel.cache_dir%/sessions" }),
    integer("metadata_update_threshold", {
      default: 0,
      info: "seconds to wait between two session metadata updates",
    }),
  ],
  { toggle: { default: false } },
)
