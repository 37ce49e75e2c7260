import { parse } from "dotenv"
import type { ConfigEntry } from "../../ports/entry"
import type { ConfigSource } from "../../ports/source"
import { type EnvMappingOptions, envEntries } from "../utils/env-entries"
import { type FileSourceOptions, readConfigFile } from "../utils/read-config-file"

/**
 * Options for creating a dotenv configuration source.
 *
 * Variables are mapped to paths the same way as {@link EnvSource} does.
 */
export type DotenvSourceOptions = FileSourceOptions & EnvMappingOptions

/**
 * A `.env` file. The file is only read; `process.env` is left untouched.
 */
export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async entries(): Promise<ConfigEntry[]> {
    const content = await readConfigFile(this.opts)
    if (content === undefined) return []

    return envEntries(parse(content), this.opts)
  }
}
