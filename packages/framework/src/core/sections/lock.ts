import { group, list, map, string } from "@stratum/config"
import { enabledIfStandalone, has } from "../capability-defaults"

/**
 * `lock: "flock"`, `lock: ["flock", "semaphore"]`, `lock: { foo: "flock" }` and the
 * `resource: [{ name, value }]` form all expand to named resource store lists.
 */
export const lock = group(
  "lock",
  [
    map("resources", list("stores", string("store")), {
      defaultKey: "default",
      namedEntries: { nameKey: "name", valueKey: "value" },
      default: (ctx) => ({ default: [has(ctx, "semaphoreLock") ? "semaphore" : "flock"] }),
    }),
  ],
  {
    toggle: { default: enabledIfStandalone() },
    shorthand: { key: "resources", absorbUnknownKeys: true },
    aliases: { resource: "resources" },
  },
)
