import { boolean, group, list, map, mutuallyExclusive, string, variable } from "@stratum/config"
import { enabledIfStandalone } from "../capability-defaults"

const VERSIONING = ["version_strategy", "version", "json_manifest_path"]

const assetPackage = group(
  "package",
  [
    string("version_strategy", { nullable: true, default: null }),
    variable("version", { nullable: true, default: null }),
    string("version_format", { nullable: true, default: null }),
    string("json_manifest_path", { nullable: true, default: null }),
    string("base_path", { default: "" }),
    list("base_urls", string("url")),
  ],
  { invariants: [mutuallyExclusive(VERSIONING, { scope: '"assets" packages' })] },
)

export const assets = group(
  "assets",
  [
    string("version_strategy", { nullable: true, default: null }),
    variable("version", { nullable: true, default: null }),
    string("version_format", { default: "%s?%s" }),
    string("base_path", { default: "" }),
    list("base_urls", string("url")),
    map("packages", assetPackage),
    string("json_manifest_path", { nullable: true, default: null }),
    boolean("strict_mode", { default: false }),
  ],
  {
    toggle: { default: enabledIfStandalone() },
    invariants: [mutuallyExclusive(VERSIONING)],
  },
)
