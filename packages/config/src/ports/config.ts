/**
 * Configuration container providing type-safe access to validated configuration values.
 *
 * @typeParam T - The shape of the configuration object, typically inferred from a zod schema.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     server: z.object({ host: z.string(), port: z.number().default(8080) }),
 *     url: z.string(),
 *   }),
 *   sources: [new TomlSource({ file: "config/default.toml", required: true }), new EnvSource({ prefix: "APP" })],
 * })
 *
 * config.get("url")                // "http://localhost:8080"
 * config.explain("server.host")    // "env"
 * config.explain("server.port")    // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object, deep-frozen */
  readonly value: T

  /** Top-level value by key */
  get<K extends keyof T & string>(key: K): T[K]

  /** Top-level keys of the validated config */
  keys(): (keyof T & string)[]

  /**
   * Explains which source provided the final value for a leaf.
   *
   * @param path - Dotted path of a leaf, e.g. `"server.port"`.
   * @returns The source name (e.g. "env", "toml:config/default.toml"), or
   * "default" when the schema filled the value in.
   */
  explain(path: string): string

  /**
   * Returns the names of all sources that contributed at least one value
   * to the final config, in the order they were first applied.
   */
  sourcesUsed(): string[]

  /**
   * Returns dotted leaf paths present in the sources but dropped by the schema.
   *
   * Useful for detecting typos, stale config, or misconfigured sources.
   */
  unknownKeys(): string[]
}
