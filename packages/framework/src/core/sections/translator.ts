import { boolean, float, group, list, map, string } from "@stratum/config"
import { enabledIfStandalone } from "../capability-defaults"

const pseudoLocalization = group(
  "pseudo_localization",
  [
    boolean("accents", { default: true }),
    float("expansion_factor", { default: 1.0 }),
    boolean("brackets", { default: true }),
    boolean("parse_html", { default: false }),
    list("localizable_html_attributes", string("attribute")),
  ],
  { toggle: { default: false } },
)

const provider = group("provider", [
  string("dsn"),
  list("domains", string("domain")),
  list("locales", string("locale")),
])

export const translator = group(
  "translator",
  [
    list("fallbacks", string("locale")),
    boolean("logging", { default: false }),
    string("formatter", { default: "translator.formatter.default" }),
    string("cache_dir", { nullable: true, default: "%kernel.cache_dir%/translations" }),
    string("default_path", { default: "%kernel.project_dir%/translations" }),
    list("paths", string("path")),
    list("enabled_locales", string("locale")),
    pseudoLocalization,
    map("providers", provider),
  ],
  {
    toggle: { default: enabledIfStandalone() },
    aliases: { fallback: "fallbacks" },
  },
)
