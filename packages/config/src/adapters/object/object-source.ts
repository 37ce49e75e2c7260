import { rootEntry } from "../../core/value/entry"
import { toConfigTable } from "../../core/value/to-config-value"
import type { ConfigEntry } from "../../ports/entry"
import type { ConfigSource } from "../../ports/source"

/**
 * An in-memory object, contributed as one root-level entry. Handy for
 * defaults and test overrides.
 */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly obj: Record<string, unknown>,
    readonly name = "object:overrides",
  ) {}

  async entries(): Promise<ConfigEntry[]> {
    return [rootEntry(toConfigTable(this.obj, this.name))]
  }
}
