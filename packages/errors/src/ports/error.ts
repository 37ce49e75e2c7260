export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error: offending paths, file names,
 * source labels. Carried alongside the message instead of being formatted
 * into it.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Stable, lowercase code for programmatic handling (e.g. `"reference_not_found"`). */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if repeating the operation might succeed */
  readonly isRetryable: boolean

  /**
   * Whether this is an expected failure caused by input (true) or a
   * programmer error / broken invariant (false).
   *
   * @remarks
   * A malformed configuration file or a dangling `${...}` reference is
   * operational. A value of an unsupported type reaching the merge engine is not.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and diagnostics output.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
