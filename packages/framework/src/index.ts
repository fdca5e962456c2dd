export { enabledIfStandalone, has } from "./core/capability-defaults"
export { createFrameworkSchema } from "./core/framework-schema"
export { defaultCapabilities } from "./ports/capabilities"
export type { FrameworkCapabilities } from "./ports/capabilities"
