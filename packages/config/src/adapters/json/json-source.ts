import { ConfigError } from "../../core/errors/config-error"
import { rootEntry } from "../../core/value/entry"
import { toConfigTable } from "../../core/value/to-config-value"
import type { ConfigEntry } from "../../ports/entry"
import type { ConfigSource } from "../../ports/source"
import { type FileSourceOptions, readConfigFile } from "../utils/read-config-file"

export type JsonSourceOptions = FileSourceOptions

/**
 * A JSON file whose top level is an object, contributed as one root-level
 * entry. `null` members are treated as absent.
 */
export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${this.opts.file}`
  }

  async entries(): Promise<ConfigEntry[]> {
    const content = await readConfigFile(this.opts)
    if (content === undefined) return []

    let parsed: unknown
    try {
      parsed = JSON.parse(content)
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
