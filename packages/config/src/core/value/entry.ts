import type { ConfigEntry } from "../../ports/entry"
import type { ConfigTable, ConfigValue } from "../../ports/value"

/** An entry that deep-merges `table` into the root. */
export function rootEntry(table: ConfigTable): ConfigEntry {
  return { path: [], value: table }
}

/**
 * An entry targeting `path`; intermediate tables are created as needed.
 *
 * @example entryAt(["server", "port"], 8080)
 */
export function entryAt(path: readonly string[], value: ConfigValue): ConfigEntry {
  return { path: [...path], value }
}
