import type { ConfigValue } from "./value"

/**
 * One contribution of a source: a value to merge at a path.
 * An empty path targets the root.
 */
export type ConfigEntry = Readonly<{
  path: readonly string[]
  value: ConfigValue
}>
