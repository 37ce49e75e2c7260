import type { ConfigEntry } from "./entry"

/**
 * A source of configuration values.
 *
 * A ConfigSource is responsible only for *producing* entries.
 * It does not merge, resolve references or validate.
 *
 * Sources are applied in order; later entries override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "env", "toml:config/default.toml", "json:config.json"
   */
  readonly name: string

  /**
   * Produce the entries of this source, in the order they must be merged.
   *
   * - file sources yield a single root entry (or none for a missing optional file)
   * - env/dotenv sources yield one targeted entry per variable
   * - every call returns fresh values; callers may mutate them
   */
  entries(): Promise<ConfigEntry[]>
}
