import { serializeError } from "@groundwork/errors"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { type LogLevelName, LogLevels } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type ConsoleWriter = Pick<Console, "trace" | "debug" | "info" | "warn" | "error">

export type ConsoleLoggerDeps = {
  console?: ConsoleWriter
}

type ConsoleMethod = "trace" | "debug" | "info" | "warn" | "error"

const LEVEL_TO_CONSOLE_METHOD: Record<LogLevelName, ConsoleMethod> = {
  trace: "trace",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
  fatal: "error",
}

const LEVEL_SEVERITY: Record<LogLevelName, number> = {
  trace: LogLevels.Trace,
  debug: LogLevels.Debug,
  info: LogLevels.Info,
  warn: LogLevels.Warn,
  error: LogLevels.Error,
  fatal: LogLevels.Fatal,
}

/**
 * Writes one line per entry to a console-like sink: JSON by default, a
 * `timestamp LEVEL message {rest}` line when `prettify` is set.
 */
export class ConsoleLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly sink: ConsoleWriter
  private readonly opts: Partial<LoggerOptions>
  private readonly context: LogContextPatch

  constructor(
    private readonly deps: ConsoleLoggerDeps = {},
    opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    this.sink = deps.console ?? globalThis.console
    this.opts = opts
    this.context = stripUndefined(context)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new ConsoleLogger<TContext & U>(this.deps, this.opts, {
      ...this.context,
      ...stripUndefined(context),
    })
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write("fatal", message, meta)
  }

  private shouldLog(level: LogLevelName): boolean {
    const min = this.opts.level ?? "info"
    return LEVEL_SEVERITY[level] >= LEVEL_SEVERITY[min]
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>) {
    if (!this.shouldLog(level)) return

    const entry: Record<string, unknown> = { ...this.context }
    for (const [key, value] of Object.entries(meta ?? {})) {
      if (value !== undefined && !RESERVED_KEYS.has(key)) entry[key] = value
    }
    if (entry.err instanceof Error) {
      entry.err = serializeError(entry.err, { includeStack: true })
    }

    const output = this.opts.prettify
      ? formatPretty(level, message, entry)
      : toJson({ timestamp: new Date().toISOString(), level, message, ...entry })

    this.sink[LEVEL_TO_CONSOLE_METHOD[level]](output)
  }
}

const RESERVED_KEYS = new Set(["timestamp", "level", "message"])

function stripUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined))
}

function toJson(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) => (typeof v === "bigint" ? v.toString() : v))
  } catch {
    return JSON.stringify({ message: "Failed to stringify log payload" })
  }
}

/** `service/module`, or whichever of the two is bound */
function scopeOf(entry: Record<string, unknown>): string {
  return [entry.service, entry.module].filter((part) => typeof part === "string").join("/")
}

/**
 * `timestamp LEVEL [service/module] message {rest}`, followed by the
 * indented stack when `err` carries one.
 */
function formatPretty(
  level: LogLevelName,
  message: string,
  entry: Record<string, unknown>,
): string {
  const { service: _service, module: _module, err, ...rest } = entry
  const scope = scopeOf(entry)

  let stack: string | undefined
  if (typeof err === "object" && err !== null && "stack" in err && typeof err.stack === "string") {
    stack = err.stack
    const { stack: _stack, ...errFields } = err
    rest.err = errFields
  } else if (err !== undefined) {
    rest.err = err
  }

  const head = [
    new Date().toISOString(),
    level.toUpperCase(),
    ...(scope ? [`[${scope}]`] : []),
    message,
  ]
  const tail = Object.keys(rest).length ? ` ${toJson(rest)}` : ""
  const line = `${head.join(" ")}${tail}`

  if (!stack) return line

  return [line, ...stack.split("\n").map((l) => `  ${l}`)].join("\n")
}

export function createConsoleLogger<TContext extends LogContext = LogContext>(
  deps: ConsoleLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
  context: LogContextPatch = {},
): Logger<TContext> {
  return new ConsoleLogger<TContext>(deps, opts, context)
}
