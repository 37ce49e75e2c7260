import type { ConfigValue } from "../../ports/value"
import { getMember, isTable } from "../value/value"

/**
 * Walks `segments` down from `root`. Returns `undefined` when a key is
 * missing or a segment would descend into something that is not a table.
 */
export function lookupPath(root: ConfigValue, segments: readonly string[]): ConfigValue | undefined {
  let current: ConfigValue = root

  for (const segment of segments) {
    if (!isTable(current)) return undefined

    const next = getMember(current, segment)
    if (next === undefined) return undefined

    current = next
  }

  return current
}
