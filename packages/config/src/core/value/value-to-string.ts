import type { ConfigValue } from "../../ports/value"
import { ConfigError } from "../errors/config-error"
import { kindOf } from "./value"

/**
 * Canonical text of a scalar, as spliced into a string by reference resolution.
 *
 * Tables and arrays have no text form and fail with `non_scalar_reference`.
 */
export function valueToString(value: ConfigValue, reference: string, location: string): string {
  if (Array.isArray(value)) {
    throw ConfigError.nonScalarReference(reference, location, "array")
  }
  // TOML local dates arrive as UTC midnight, so they render with a time part
  if (value instanceof Date) return value.toISOString()
  if (typeof value === "object") {
    throw ConfigError.nonScalarReference(reference, location, kindOf(value))
  }
  if (typeof value === "boolean") return value ? "true" : "false"

  return value.toString()
}
