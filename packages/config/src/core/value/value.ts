import type { ConfigTable, ConfigTree, ConfigValue, ConfigValueKind } from "../../ports/value"

export function isTable(value: ConfigValue): value is ConfigTable {
  return typeof value === "object" && !Array.isArray(value) && !(value instanceof Date)
}

export function kindOf(value: ConfigValue): ConfigValueKind {
  if (Array.isArray(value)) return "array"
  if (value instanceof Date) return "datetime"
  if (typeof value === "object") return "table"
  if (typeof value === "string") return "string"
  if (typeof value === "boolean") return "boolean"
  if (typeof value === "bigint") return "integer"

  return Number.isInteger(value) ? "integer" : "float"
}

/** Deep copy; dates and bigints survive as they are. */
export function cloneValue<V extends ConfigValue>(value: V): V {
  return structuredClone(value)
}

export function createTree(): ConfigTree {
  return { root: {} }
}

/**
 * Sets an own, enumerable member. Plain assignment would treat `__proto__`
 * as the prototype instead of a key.
 */
export function setMember(table: ConfigTable, key: string, value: ConfigValue): void {
  Object.defineProperty(table, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  })
}

export function getMember(table: ConfigTable, key: string): ConfigValue | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined
}
