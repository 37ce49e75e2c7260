import { ConfigBuilder } from "@groundwork/config"
import type { Logger } from "@groundwork/logger"
import { appConfigSchema, type LoadedAppConfig } from "./schema"

/** Variables named `APP__<SECTION>__<KEY>` override file values. */
export const ENV_PREFIX = "APP"

export type LoadAppConfigOptions = {
  env?: NodeJS.ProcessEnv
  /** Directory holding `config/` and an optional `.env` */
  cwd?: string
  logger?: Logger
}

/**
 * Layers, lowest precedence first: `config/default.toml`,
 * `config/<APP_PROFILE>.toml` (default profile "dev"), `.env`, the environment.
 */
export async function loadAppConfig(options: LoadAppConfigOptions = {}): Promise<LoadedAppConfig> {
  const env = options.env ?? process.env
  const cwd = options.cwd ?? process.cwd()
  const profile = env.APP_PROFILE ?? "dev"

  const builder = ConfigBuilder.create()
    .withFile("config/default.toml", true, { cwd })
    .withFile(`config/${profile}.toml`, false, { cwd })
    .withDotenv(".env", false, { cwd, prefix: ENV_PREFIX })
    .withEnv(ENV_PREFIX, undefined, env)

  if (options.logger) builder.withLogger(options.logger)

  return builder.build(appConfigSchema)
}
