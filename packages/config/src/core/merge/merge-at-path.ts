import type { ConfigTable, ConfigTree, ConfigValue } from "../../ports/value"
import { cloneValue, getMember, isTable, setMember } from "../value/value"

/**
 * Merges `source` into `target` in place. Nested tables merge; any other
 * pairing is replaced by the incoming value, arrays included.
 */
export function deepMerge(target: ConfigTable, source: ConfigTable): void {
  const stack: [ConfigTable, ConfigTable][] = [[target, source]]

  for (let pair = stack.pop(); pair; pair = stack.pop()) {
    const [into, from] = pair

    for (const [key, incoming] of Object.entries(from)) {
      const existing = getMember(into, key)

      if (existing !== undefined && isTable(existing) && isTable(incoming)) {
        stack.push([existing, incoming])
      } else {
        setMember(into, key, incoming)
      }
    }
  }
}

/**
 * Applies one entry to the tree.
 *
 * - empty path: a table deep-merges into a table root; anything else replaces the root
 * - non-empty path: missing or non-table intermediates become empty tables,
 *   then the value deep-merges (table into table) or replaces at the last segment
 *
 * The value is copied first; the tree never shares objects with the caller.
 */
export function mergeAtPath(tree: ConfigTree, path: readonly string[], value: ConfigValue): void {
  const incoming = cloneValue(value)
  const key = path[path.length - 1]

  if (key === undefined) {
    if (isTable(tree.root) && isTable(incoming)) deepMerge(tree.root, incoming)
    else tree.root = incoming
    return
  }

  let current: ConfigTable
  if (isTable(tree.root)) {
    current = tree.root
  } else {
    current = {}
    tree.root = current
  }

  for (const segment of path.slice(0, -1)) {
    const child = getMember(current, segment)

    if (child !== undefined && isTable(child)) {
      current = child
    } else {
      const created: ConfigTable = {}
      setMember(current, segment, created)
      current = created
    }
  }

  const existing = getMember(current, key)

  if (existing !== undefined && isTable(existing) && isTable(incoming)) {
    deepMerge(existing, incoming)
  } else {
    setMember(current, key, incoming)
  }
}
