import type { ConfigEntry } from "../../ports/entry"
import type { ConfigSource } from "../../ports/source"
import { type EnvMappingOptions, envEntries } from "../utils/env-entries"

export type EnvSourceOptions = EnvMappingOptions & {
  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>
}

/**
 * Environment variables, one targeted entry per variable.
 *
 * @example
 * ```typescript
 * // APP__SERVER__PORT=9090  ->  server.port = 9090
 * new EnvSource({ prefix: "APP" })
 * ```
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly env: Readonly<Record<string, string | undefined>>
  private readonly mapping: EnvMappingOptions

  constructor(options: EnvSourceOptions = {}) {
    const { env, ...mapping } = options
    this.env = env ?? process.env
    this.mapping = mapping
  }

  async entries(): Promise<ConfigEntry[]> {
    return envEntries(this.env, this.mapping)
  }
}
