import { createConsoleLogger } from "@groundwork/logger"
import { createAppContext } from "./app/create-context"

try {
  const ctx = await createAppContext()
  const { app, server, database, logging } = ctx.config.value

  ctx.logger.info("configuration loaded", {
    env: app.env,
    debug: app.debug,
    sources: ctx.config.sourcesUsed(),
  })
  ctx.logger.info(logging.banner ?? app.name, { url: server.base_url, database: database.url })
  ctx.logger.debug("database url set by", { source: ctx.config.explain("database.url") })

  const unknown = ctx.config.unknownKeys()
  if (unknown.length) ctx.logger.warn("configuration keys not in schema", { keys: unknown })
} catch (err) {
  createConsoleLogger().fatal("startup failed", { err })
  process.exitCode = 1
}
