import { load } from "js-toml"
import { ConfigError } from "../../core/errors/config-error"
import { rootEntry } from "../../core/value/entry"
import { toConfigTable } from "../../core/value/to-config-value"
import type { ConfigEntry } from "../../ports/entry"
import type { ConfigSource } from "../../ports/source"
import { type FileSourceOptions, readConfigFile } from "../utils/read-config-file"

export type TomlSourceOptions = FileSourceOptions

/**
 * A TOML file, contributed as one root-level entry.
 */
export class TomlSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: TomlSourceOptions) {
    this.name = `toml:${opts.file}`
  }

  async entries(): Promise<ConfigEntry[]> {
    const content = await readConfigFile(this.opts)
    if (content === undefined) return []

    let parsed: unknown
    try {
      parsed = load(content)
    } catch (err) {
      throw ConfigError.parseFailed(
        this.opts.file,
        err instanceof Error ? err.message : String(err),
        err,
      )
    }

    return [rootEntry(toConfigTable(parsed, this.opts.file))]
  }
}
