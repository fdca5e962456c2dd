import { z } from "zod"
import type { Scalar, ScalarNode, ScalarType } from "../../ports/node"

const integerString = z
  .string()
  .regex(/^[+-]?\d+$/)
  .transform(Number)

const floatString = z
  .string()
  .regex(/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/)
  .transform(Number)

/**
 * Accepted inputs per scalar type. Strings from env and dotenv layers coerce
 * to booleans and numbers.
 */
const scalarSchemas: Record<ScalarType, z.ZodType<Scalar>> = {
  string: z.string(),
  boolean: z.union([z.boolean(), z.stringbool()]),
  integer: z.union([z.int(), integerString.pipe(z.int())]),
  float: z.union([z.number(), floatString.pipe(z.number())]),
  variable: z.union([z.string(), z.number(), z.boolean()]),
}

const expectedByType: Record<ScalarType, string> = {
  string: "a string",
  boolean: "a boolean",
  integer: "an integer",
  float: "a number",
  variable: "a scalar",
}

export type ScalarCheck =
  | { readonly ok: true; readonly value: Scalar }
  | { readonly ok: false; readonly reason: "type"; readonly expected: string }
  | { readonly ok: false; readonly reason: "value"; readonly allowed: readonly Scalar[] }

/**
 * Coerces `value` to the node's type and checks it against `allowedValues`.
 * Patterns are left to the validator.
 */
export function checkScalar(node: ScalarNode, value: Scalar): ScalarCheck {
  if (value === null) {
    return node.nullable
      ? { ok: true, value: null }
      : { ok: false, reason: "type", expected: expectedByType[node.type] }
  }

  const parsed = scalarSchemas[node.type].safeParse(value)

  if (!parsed.success) {
    return { ok: false, reason: "type", expected: expectedByType[node.type] }
  }

  const allowed = node.allowedValues

  if (allowed && !allowed.includes(parsed.data)) {
    return { ok: false, reason: "value", allowed }
  }

  return { ok: true, value: parsed.data }
}
