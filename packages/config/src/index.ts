export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { ObjectSource } from "./adapters/object/object-source"
export { TomlSource, type TomlSourceOptions } from "./adapters/toml/toml-source"
export {
  coerceEnvValue,
  DEFAULT_SEPARATOR,
  type EnvMappingOptions,
  envEntries,
  envKeyToPath,
} from "./adapters/utils/env-entries"
export type { FileSourceOptions } from "./adapters/utils/read-config-file"
export { ConfigBuilder, type FileOptions } from "./core/builder"
export { Config, DEFAULT_SOURCE } from "./core/config"
export {
  ConfigError,
  type ConfigErrorCode,
  isConfigError,
  type ValidationIssue,
} from "./core/errors/config-error"
export { DEFAULT_ENV_PREFIX, type LoadConfigOptions, loadConfig } from "./core/load"
export { deepMerge, mergeAtPath } from "./core/merge/merge-at-path"
export { lookupPath } from "./core/resolve/lookup-path"
export {
  MAX_PASSES,
  type ResolveStats,
  resolvePass,
  resolveReferences,
} from "./core/resolve/resolve-references"
export {
  escapeLiterals,
  parseReference,
  type ReferenceLookup,
  type ResolvedString,
  resolveString,
  unescapeLiterals,
} from "./core/resolve/resolve-string"
export { entryAt, rootEntry } from "./core/value/entry"
export { toConfigTable, toConfigValue } from "./core/value/to-config-value"
export { cloneValue, createTree, isTable, kindOf } from "./core/value/value"
export { valueToString } from "./core/value/value-to-string"
export type { IConfig } from "./ports/config"
export type { ConfigEntry } from "./ports/entry"
export type { ConfigSource } from "./ports/source"
export type {
  ConfigScalar,
  ConfigTable,
  ConfigTree,
  ConfigValue,
  ConfigValueKind,
} from "./ports/value"
