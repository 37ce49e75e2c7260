import fs from "node:fs/promises"
import path from "node:path"
import { ConfigError } from "../../core/errors/config-error"

export type FileSourceOptions = {
  /**
   * Path to the file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "config/default.toml", "./config/app.json"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: fails with `file_not_found` if the file is missing.
   * - `false`: yields no entries if the file is missing.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT"
}

/**
 * Reads a configuration file as UTF-8.
 *
 * @returns the content, or `undefined` for a missing optional file
 */
export async function readConfigFile(opts: FileSourceOptions): Promise<string | undefined> {
  const filePath = path.resolve(opts.cwd ?? process.cwd(), opts.file)

  try {
    return await fs.readFile(filePath, "utf-8")
  } catch (err) {
    if (!isMissingFile(err)) throw ConfigError.readFailed(opts.file, err)
    if (opts.required) throw ConfigError.fileNotFound(opts.file, err)
    return undefined
  }
}
