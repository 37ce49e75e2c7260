/**
 * Leaf values of a configuration tree.
 *
 * Integers are `number` while they fit the safe range and `bigint` beyond it,
 * always within 64-bit signed bounds. Dates are carried through unmodified.
 */
export type ConfigScalar = string | number | bigint | boolean | Date

export type ConfigTable = { [key: string]: ConfigValue }

export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigTable

export type ConfigValueKind =
  | "table"
  | "array"
  | "string"
  | "integer"
  | "float"
  | "boolean"
  | "datetime"

/**
 * Mutable holder for the tree under construction. The root may itself be
 * replaced by a root-level entry that is not a table.
 */
export type ConfigTree = {
  root: ConfigValue
}
