import type { DefaultContext } from "@stratum/config"
import type { FrameworkCapabilities } from "../ports/capabilities"

type CapabilityName = keyof FrameworkCapabilities

export function has({ capabilities }: DefaultContext, name: CapabilityName): boolean {
  return capabilities[name] === true
}

/**
 * Enabled unless running full-stack, and only when every named component is installed.
 */
export function enabledIfStandalone(...requires: CapabilityName[]) {
  return (ctx: DefaultContext): boolean =>
    !has(ctx, "fullStack") && requires.every((name) => has(ctx, name))
}
