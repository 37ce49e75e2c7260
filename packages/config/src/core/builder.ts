import type { Logger } from "@groundwork/logger"
import type { z } from "zod"
import { DotenvSource } from "../adapters/dotenv/dotenv-source"
import { EnvSource } from "../adapters/env/env-source"
import { JsonSource } from "../adapters/json/json-source"
import { ObjectSource } from "../adapters/object/object-source"
import { TomlSource } from "../adapters/toml/toml-source"
import type { EnvMappingOptions } from "../adapters/utils/env-entries"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { loadConfig } from "./load"

export type FileOptions = {
  /** Base directory for relative paths. @default process.cwd() */
  cwd?: string
}

/**
 * Fluent front end to {@link loadConfig}. Sources apply in call order.
 *
 * @example
 * ```typescript
 * const config = await ConfigBuilder.create()
 *   .withFile("config/default.toml", true)
 *   .withFile(`config/${env}.toml`, false)
 *   .withEnv("APP")
 *   .build(schema)
 * ```
 */
export class ConfigBuilder {
  private readonly sources: ConfigSource[] = []
  private logger: Logger | undefined

  private constructor() {}

  static create(): ConfigBuilder {
    return new ConfigBuilder()
  }

  /** A `.json` file is read as JSON, anything else as TOML. */
  withFile(file: string, required: boolean, opts: FileOptions = {}): this {
    const options = { file, required, ...opts }
    this.sources.push(
      file.toLowerCase().endsWith(".json") ? new JsonSource(options) : new TomlSource(options),
    )
    return this
  }

  withEnv(
    prefix: string,
    separator?: string,
    env?: Readonly<Record<string, string | undefined>>,
  ): this {
    this.sources.push(new EnvSource({ prefix, separator, env }))
    return this
  }

  withDotenv(
    file: string,
    required: boolean,
    opts: FileOptions & EnvMappingOptions = {},
  ): this {
    this.sources.push(new DotenvSource({ file, required, ...opts }))
    return this
  }

  withObject(obj: Record<string, unknown>, name?: string): this {
    this.sources.push(new ObjectSource(obj, name))
    return this
  }

  withSource(source: ConfigSource): this {
    this.sources.push(source)
    return this
  }

  withLogger(logger: Logger): this {
    this.logger = logger
    return this
  }

  build<T extends Record<string, unknown>>(schema: z.core.$ZodType<T>): Promise<IConfig<T>> {
    return loadConfig({ schema, sources: [...this.sources], logger: this.logger })
  }
}
