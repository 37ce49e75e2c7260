import type { IConfig } from "../ports/config"
import { deepFreeze } from "./utils/deep-freeze"
import { isPlainRecord } from "./utils/leaf-paths"

export const DEFAULT_SOURCE = "default"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  private readonly data: T

  /**
   * @param provenance - dotted leaf path of the validated data to the source that set it
   * @param mergedLeaves - dotted leaf paths of the merged tree, before validation
   * @param sourceOrder - source names in the order they were applied
   */
  constructor(
    data: T,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly mergedLeaves: readonly string[],
    private readonly sourceOrder: readonly string[] = [],
  ) {
    this.data = deepFreeze(data)
  }

  get value(): T {
    return this.data
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }

  keys(): (keyof T & string)[] {
    return Object.keys(this.data).filter((k): k is keyof T & string =>
      Object.hasOwn(this.data, k),
    )
  }

  explain(path: string): string {
    return this.provenance.get(path) ?? DEFAULT_SOURCE
  }

  sourcesUsed(): string[] {
    const used = new Set(this.provenance.values())
    const ordered = [...new Set([...this.sourceOrder, ...used])]

    return ordered.filter((name) => used.has(name))
  }

  unknownKeys(): string[] {
    return this.mergedLeaves.filter((leaf) => !this.isKnown(leaf))
  }

  /**
   * A merged leaf is known when the validated data still has it, or when the
   * schema turned one of its ancestors into something other than a table.
   */
  private isKnown(leaf: string): boolean {
    let node: unknown = this.data

    for (const segment of leaf.split(".")) {
      if (!isPlainRecord(node)) return true
      if (!Object.hasOwn(node, segment)) return false
      node = node[segment]
    }

    return true
  }
}
