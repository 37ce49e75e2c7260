import { isAppError } from "@groundwork/errors"
import { type Logger, NullLogger } from "@groundwork/logger"
import { z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigEntry } from "../ports/entry"
import type { ConfigSource } from "../ports/source"
import { Config, DEFAULT_SOURCE } from "./config"
import { ConfigError } from "./errors/config-error"
import { mergeAtPath } from "./merge/merge-at-path"
import { resolveReferences } from "./resolve/resolve-references"
import { joinPath, leafPaths } from "./utils/leaf-paths"
import { createTree } from "./value/value"

/**
 * Prefix of the variables read when no sources are given. Unrelated variables
 * stay out of the tree, so their values never go through reference resolution.
 */
export const DEFAULT_ENV_PREFIX = "APP"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  /** zod schema (classic or mini) the resolved tree must satisfy */
  schema: z.core.$ZodType<T>

  /**
   * Applied in order; later entries override earlier ones.
   * Default: `APP__*` variables, `[new EnvSource({ prefix: DEFAULT_ENV_PREFIX })]`
   */
  sources?: readonly ConfigSource[]

  logger?: Logger
}

async function collectEntries(source: ConfigSource): Promise<ConfigEntry[]> {
  try {
    return await source.entries()
  } catch (err) {
    if (isAppError(err)) throw err
    throw ConfigError.sourceFailed(source.name, err)
  }
}

function entryLeaves(entry: ConfigEntry): string[] {
  return leafPaths(entry.value, entry.path.join("."))
}

function findSource(recorded: ReadonlyMap<string, string>, leaf: string): string {
  for (let path = leaf; ; path = path.slice(0, path.lastIndexOf("."))) {
    const hit = recorded.get(path)
    if (hit !== undefined) return hit
    if (!path.includes(".")) break
  }

  for (const [path, source] of recorded) {
    if (path.startsWith(`${leaf}.`)) return source
  }

  return DEFAULT_SOURCE
}

/**
 * Builds a configuration: merges the entries of every source in order,
 * resolves `${path}` references, validates the result against `schema` and
 * freezes it.
 *
 * @throws {ConfigError} on a failing source, a reference error or a schema mismatch
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
  logger,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const log = (logger ?? new NullLogger()).child({ module: "config" })
  const resolvedSources = sources ?? [new EnvSource({ prefix: DEFAULT_ENV_PREFIX })]

  const tree = createTree()
  const recorded = new Map<string, string>()

  for (const source of resolvedSources) {
    const entries = await collectEntries(source)

    for (const entry of entries) {
      mergeAtPath(tree, entry.path, entry.value)

      for (const leaf of entryLeaves(entry)) {
        recorded.delete(leaf)
        recorded.set(leaf, source.name)
      }
    }

    log.debug("source merged", { source: source.name, entries: entries.length })
  }

  const stats = resolveReferences(tree)
  log.debug("references resolved", stats)

  const result = await z.safeParseAsync(schema, tree.root)

  if (!result.success) {
    throw ConfigError.validationFailed(
      z.prettifyError(result.error),
      result.error.issues,
      result.error,
    )
  }

  const provenance = new Map<string, string>()
  for (const leaf of leafPaths(result.data)) {
    if (leaf !== "") provenance.set(leaf, findSource(recorded, leaf))
  }

  const mergedLeaves = leafPaths(tree.root).filter((leaf) => leaf !== "")
  const config = new Config<T>(
    result.data,
    provenance,
    mergedLeaves,
    resolvedSources.map((s) => s.name),
  )

  const unknown = config.unknownKeys()
  if (unknown.length) log.debug("keys not in schema", { keys: unknown })

  return config
}
