import { type Logger, NullLogger } from "@groundwork/logger"
import { ContextError } from "./errors/context-error"

export const DEFAULT_SERVICE_NAME = "app"

type BuilderState<C> = {
  config: C
  logger?: Logger
  name?: string
}

/**
 * Shared application state: the validated configuration and a logger bound
 * to the service name. Built once at startup, read everywhere after.
 *
 * @example
 * ```typescript
 * const ctx = AppContext.builder()
 *   .withName("billing")
 *   .withConfig(await ConfigBuilder.create().withFile("config/default.toml", true).build(schema))
 *   .build()
 *
 * ctx.config.value.server.port
 * ```
 */
export class AppContext<C> {
  constructor(
    readonly config: C,
    readonly logger: Logger,
    readonly name: string,
  ) {}

  static builder(): AppContextBuilder<undefined> {
    return new AppContextBuilder({ config: undefined })
  }
}

/**
 * Builder for {@link AppContext}. The type parameter records whether a
 * configuration has been attached; `build()` also checks it at run time.
 */
export class AppContextBuilder<C> {
  constructor(private readonly state: BuilderState<C>) {}

  withConfig<N>(config: N): AppContextBuilder<N> {
    return new AppContextBuilder({ ...this.state, config })
  }

  withLogger(logger: Logger): AppContextBuilder<C> {
    return new AppContextBuilder({ ...this.state, logger })
  }

  withName(name: string): AppContextBuilder<C> {
    return new AppContextBuilder({ ...this.state, name })
  }

  /**
   * @throws {ContextError} `missing_config` when no configuration was attached
   */
  build(): AppContext<NonNullable<C>> {
    const { config, logger, name = DEFAULT_SERVICE_NAME } = this.state

    if (config === undefined || config === null) throw ContextError.missingConfig()

    return new AppContext(config, (logger ?? new NullLogger()).child({ service: name }), name)
  }
}
