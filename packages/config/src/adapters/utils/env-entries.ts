import { entryAt } from "../../core/value/entry"
import type { ConfigEntry } from "../../ports/entry"
import type { ConfigValue } from "../../ports/value"

export const DEFAULT_SEPARATOR = "__"

export type EnvMappingOptions = {
  /**
   * Only variables named `<prefix><separator>...` are used; the prefix is
   * stripped. Without a prefix every variable is mapped.
   *
   * @example "APP" maps `APP__SERVER__PORT` to `server.port`
   */
  prefix?: string

  /**
   * Separator between path segments in variable names.
   *
   * @default "__"
   */
  separator?: string
}

const INTEGER = /^-?\d+$/
const FLOAT = /^[+-]?(\d+\.\d*|\.\d+)([eE][+-]?\d+)?$/

const I64_MIN = -(2n ** 63n)
const I64_MAX = 2n ** 63n - 1n

/**
 * Reads the text of a variable as the narrowest fitting value:
 * boolean, 64-bit integer, float, or string.
 */
export function coerceEnvValue(raw: string): ConfigValue {
  const lower = raw.toLowerCase()
  if (lower === "true") return true
  if (lower === "false") return false

  if (INTEGER.test(raw)) {
    const big = BigInt(raw)
    if (big >= BigInt(Number.MIN_SAFE_INTEGER) && big <= BigInt(Number.MAX_SAFE_INTEGER)) {
      return Number(big)
    }
    // beyond i64 the digits stay text
    return big >= I64_MIN && big <= I64_MAX ? big : raw
  }

  if (FLOAT.test(raw)) return Number(raw)

  return raw
}

/**
 * Maps variable names to configuration paths: prefix stripped, split on the
 * separator, lowercased. `APP__DATABASE__URL` becomes `database.url`.
 */
export function envKeyToPath(key: string, opts: EnvMappingOptions = {}): string[] | undefined {
  const separator = opts.separator ?? DEFAULT_SEPARATOR
  let remainder = key

  if (opts.prefix) {
    const head = `${opts.prefix}${separator}`
    if (!key.startsWith(head)) return undefined
    remainder = key.slice(head.length)
  }

  if (remainder === "") return undefined

  return remainder.split(separator).map((segment) => segment.toLowerCase())
}

export function envEntries(
  vars: Readonly<Record<string, string | undefined>>,
  opts: EnvMappingOptions = {},
): ConfigEntry[] {
  const entries: ConfigEntry[] = []

  for (const [key, raw] of Object.entries(vars)) {
    if (raw === undefined) continue

    const path = envKeyToPath(key, opts)
    if (path) entries.push(entryAt(path, coerceEnvValue(raw)))
  }

  return entries
}
