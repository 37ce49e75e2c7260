import type { ConfigTree, ConfigValue } from "../../ports/value"
import { ConfigError } from "../errors/config-error"
import { isTable, setMember } from "../value/value"
import { lookupPath } from "./lookup-path"
import { resolveString, unescapeLiterals } from "./resolve-string"

/** Passes allowed before giving up; longer chains read as cycles. */
export const MAX_PASSES = 100

/**
 * Resolved strings may total at most this many times the length they started
 * with, and never less than {@link STRING_BUDGET_FLOOR} characters. A cycle
 * that fans out outgrows the budget long before it reaches {@link MAX_PASSES}.
 */
export const MAX_GROWTH = 1024
export const STRING_BUDGET_FLOOR = 1 << 20

export type ResolveStats = {
  /** Passes run, the final one (with no substitutions) included */
  passes: number
  substitutions: number
}

type Slot = {
  value: ConfigValue
  location: string
  set: (text: string) => void
}

function childLocation(parent: string, key: string | number): string {
  if (typeof key === "number") return `${parent}[${key}]`
  return parent ? `${parent}.${key}` : key
}

/**
 * Rewrites every string of the tree in place, pre-order, members in
 * insertion order.
 */
function rewriteStrings(tree: ConfigTree, rewrite: (text: string, location: string) => string) {
  const stack: Slot[] = [
    {
      value: tree.root,
      location: "",
      set: (text) => {
        tree.root = text
      },
    },
  ]

  for (let slot = stack.pop(); slot; slot = stack.pop()) {
    const { value, location } = slot

    if (typeof value === "string") {
      slot.set(rewrite(value, location))
      continue
    }

    const children: Slot[] = []

    if (Array.isArray(value)) {
      value.forEach((item, index) => {
        children.push({
          value: item,
          location: childLocation(location, index),
          set: (text) => {
            value[index] = text
          },
        })
      })
    } else if (isTable(value)) {
      for (const [key, item] of Object.entries(value)) {
        children.push({
          value: item,
          location: childLocation(location, key),
          set: (text) => setMember(value, key, text),
        })
      }
    }

    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i]
      if (child) stack.push(child)
    }
  }
}

function stringLength(root: ConfigValue): number {
  let total = 0
  const stack: ConfigValue[] = [root]

  for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
    if (typeof node === "string") {
      total += node.length
    } else if (Array.isArray(node)) {
      for (const item of node) stack.push(item)
    } else if (isTable(node)) {
      for (const item of Object.values(node)) stack.push(item)
    }
  }

  return total
}

/**
 * Runs one substitution pass over the whole tree. Lookups see the tree as it
 * is at that moment, earlier rewrites of the same pass included.
 *
 * @param budget - Total length the rewritten strings may reach
 * @returns number of substitutions made
 */
export function resolvePass(tree: ConfigTree, budget = Number.POSITIVE_INFINITY): number {
  let substitutions = 0
  let length = 0
  const lookup = (segments: readonly string[]) => lookupPath(tree.root, segments)

  rewriteStrings(tree, (text, location) => {
    const resolved = resolveString(text, lookup, location)
    substitutions += resolved.substitutions
    length += resolved.text.length
    if (length > budget) throw ConfigError.circularReference(MAX_PASSES, budget)
    return resolved.text
  })

  return substitutions
}

/**
 * Substitutes `${path}` references until a pass makes no substitution, then
 * turns `$$` escapes into literal dollars.
 *
 * Fails fast with a {@link ConfigError}; the tree is left partially rewritten.
 */
export function resolveReferences(tree: ConfigTree): ResolveStats {
  let substitutions = 0
  const budget = Math.max(stringLength(tree.root) * MAX_GROWTH, STRING_BUDGET_FLOOR)

  for (let passes = 1; passes <= MAX_PASSES; passes++) {
    const made = resolvePass(tree, budget)
    substitutions += made

    if (made === 0) {
      rewriteStrings(tree, unescapeLiterals)
      return { passes, substitutions }
    }
  }

  throw ConfigError.circularReference(MAX_PASSES)
}
