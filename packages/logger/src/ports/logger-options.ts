import type { LogLevelName } from "./log-level"

/**
 * Policy shared by every adapter: which levels are emitted and whether the
 * output is meant for humans or for a log processor.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   *
   * Example: "info" will suppress "trace" and "debug" logs.
   */
  level: LogLevelName

  /**
   * Pretty-print for local development. Leave off in production, where
   * structured JSON lines are expected.
   */
  prettify?: boolean
}
