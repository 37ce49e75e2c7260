import type { ConfigTable, ConfigValue } from "../../ports/value"
import { ConfigError } from "../errors/config-error"
import { setMember } from "./value"

function isPlainObject(raw: object): boolean {
  const proto: unknown = Object.getPrototypeOf(raw)
  return proto === Object.prototype || proto === null
}

function typeName(raw: unknown): string {
  if (raw === null) return "null"
  if (typeof raw === "object") return raw.constructor?.name ?? "object"
  return typeof raw
}

function at(path: readonly (string | number)[]): string {
  return path.length ? ` at "${path.join(".")}"` : ""
}

function convertTable(raw: object, origin: string, path: (string | number)[]): ConfigTable {
  const table: ConfigTable = {}
  for (const [key, member] of Object.entries(raw)) {
    // null and undefined mean "not provided"
    if (member === null || member === undefined) continue
    setMember(table, key, convert(member, origin, [...path, key]))
  }
  return table
}

function convert(raw: unknown, origin: string, path: (string | number)[]): ConfigValue {
  switch (typeof raw) {
    case "string":
    case "number":
    case "bigint":
    case "boolean":
      return raw
  }

  if (raw instanceof Date) return new Date(raw.getTime())

  if (Array.isArray(raw)) {
    return raw.map((item: unknown, i) => {
      if (item === null || item === undefined) {
        throw ConfigError.parseFailed(origin, `array element is ${String(item)}${at([...path, i])}`)
      }
      return convert(item, origin, [...path, i])
    })
  }

  if (typeof raw === "object" && raw !== null && isPlainObject(raw)) {
    return convertTable(raw, origin, path)
  }

  throw ConfigError.parseFailed(origin, `unsupported value of type ${typeName(raw)}${at(path)}`)
}

/**
 * Converts parser output into a configuration value.
 *
 * @param origin - Where the value came from, used in `parse_failed` messages.
 */
export function toConfigValue(raw: unknown, origin: string): ConfigValue {
  return convert(raw, origin, [])
}

/** Like {@link toConfigValue}, but the top level must be a table. */
export function toConfigTable(raw: unknown, origin: string): ConfigTable {
  if (typeof raw !== "object" || raw === null || !isPlainObject(raw)) {
    throw ConfigError.parseFailed(origin, `top level must be a table, got ${typeName(raw)}`)
  }

  return convertTable(raw, origin, [])
}
