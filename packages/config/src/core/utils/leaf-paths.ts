export function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

export function joinPath(prefix: string, key: string): string {
  return prefix ? `${prefix}.${key}` : key
}

/**
 * Dotted paths of every leaf under `value`, in document order. Arrays and
 * empty tables are leaves; a non-table `value` yields `prefix` itself.
 */
export function leafPaths(value: unknown, prefix = ""): string[] {
  const out: string[] = []
  const stack: [string, unknown][] = [[prefix, value]]

  for (let item = stack.pop(); item; item = stack.pop()) {
    const [path, node] = item

    if (!isPlainRecord(node) || Object.keys(node).length === 0) {
      out.push(path)
      continue
    }

    const keys = Object.keys(node)
    for (let i = keys.length - 1; i >= 0; i--) {
      const key = keys[i]
      if (key !== undefined) stack.push([joinPath(path, key), node[key]])
    }
  }

  return out
}
