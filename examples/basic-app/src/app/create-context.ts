import path from "node:path"
import { fileURLToPath } from "node:url"
import { AppContext } from "@groundwork/context"
import { createPinoLogger, type Logger } from "@groundwork/logger"
import { type LoadedAppConfig, loadAppConfig } from "./config"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  cwd?: string
  /** Replaces the pino logger built from `logging.*` */
  logger?: Logger
}

export type BasicAppContext = AppContext<LoadedAppConfig>

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..")

export async function createAppContext(options: AppContextOptions = {}): Promise<BasicAppContext> {
  const config = await loadAppConfig({
    env: options.env,
    cwd: options.cwd ?? projectRoot,
    logger: options.logger,
  })

  const { app, logging } = config.value
  const logger =
    options.logger ?? createPinoLogger({}, { level: logging.level, prettify: logging.prettify })

  return AppContext.builder().withName(app.name).withLogger(logger).withConfig(config).build()
}
