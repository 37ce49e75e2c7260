export { ENV_PREFIX, type LoadAppConfigOptions, loadAppConfig } from "./load-app-config"
export { type AppConfig, appConfigSchema, type LoadedAppConfig } from "./schema"
