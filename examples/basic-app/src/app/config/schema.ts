import type { IConfig } from "@groundwork/config"
import { logLevelNames } from "@groundwork/logger"
import { z } from "zod/mini"

export const appConfigSchema = z.object({
  app: z.object({
    name: z.string(),
    env: z._default(z.string(), "development"),
    debug: z._default(z.boolean(), false),
  }),

  server: z.object({
    host: z._default(z.string(), "0.0.0.0"),
    port: z._default(z.int(), 8080),
    base_url: z.string(),
  }),

  database: z.object({
    host: z.string(),
    port: z._default(z.int(), 5432),
    name: z.string(),
    url: z.string(),
  }),

  logging: z.object({
    level: z._default(z.enum(logLevelNames), "info"),
    prettify: z._default(z.boolean(), false),
    banner: z.optional(z.string()),
  }),
})

export type AppConfig = z.infer<typeof appConfigSchema>

export type LoadedAppConfig = IConfig<AppConfig>
