import { BaseError, type ErrorContext } from "@groundwork/errors"
import type { ConfigValueKind } from "../../ports/value"

export type ConfigErrorCode =
  | "circular_reference"
  | "reference_not_found"
  | "invalid_reference_path"
  | "non_scalar_reference"
  | "unclosed_reference"
  | "file_not_found"
  | "read_failed"
  | "parse_failed"
  | "source_failed"
  | "validation_failed"

export type ValidationIssue = { path: string; message: string }

type IssueLike = {
  path: readonly PropertyKey[]
  message: string
}

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

/**
 * Failure while assembling a configuration. Every code is fatal to the build.
 */
export class ConfigError extends BaseError<ConfigErrorCode> {
  /** @param budget - Set when resolved strings outgrew it before the pass limit */
  static circularReference(maxPasses: number, budget?: number): ConfigError {
    if (budget !== undefined) {
      return new ConfigError(
        `Resolved strings grew past ${budget} characters; a reference cycle is likely`,
        { code: "circular_reference", context: { maxPasses, budget } },
      )
    }

    return new ConfigError(
      `References did not settle after ${maxPasses} passes; a reference cycle is likely`,
      { code: "circular_reference", context: { maxPasses } },
    )
  }

  static referenceNotFound(reference: string, location: string): ConfigError {
    return new ConfigError(`Reference \${${reference}} at "${location}" points to nothing`, {
      code: "reference_not_found",
      context: { reference, location },
    })
  }

  static invalidReferencePath(reference: string, location: string): ConfigError {
    return new ConfigError(`Invalid reference path "${reference}" at "${location}"`, {
      code: "invalid_reference_path",
      context: { reference, location },
    })
  }

  static nonScalarReference(
    reference: string,
    location: string,
    kind: ConfigValueKind,
  ): ConfigError {
    return new ConfigError(
      `Reference \${${reference}} at "${location}" points to a ${kind}, not a scalar`,
      { code: "non_scalar_reference", context: { reference, location, kind } },
    )
  }

  static unclosedReference(text: string, location: string): ConfigError {
    return new ConfigError(`Unclosed reference in "${text}" at "${location}"`, {
      code: "unclosed_reference",
      context: { text, location },
    })
  }

  static fileNotFound(file: string, cause?: unknown): ConfigError {
    return new ConfigError(`Configuration file not found: ${file}`, {
      code: "file_not_found",
      context: { file },
      cause,
    })
  }

  static readFailed(file: string, cause: unknown): ConfigError {
    return new ConfigError(`Failed to read configuration file: ${file}`, {
      code: "read_failed",
      context: { file },
      cause,
    })
  }

  static parseFailed(origin: string, detail: string, cause?: unknown): ConfigError {
    return new ConfigError(`Failed to parse ${origin}: ${detail}`, {
      code: "parse_failed",
      context: { origin },
      cause,
    })
  }

  static sourceFailed(source: string, cause: unknown): ConfigError {
    return new ConfigError(`Configuration source "${source}" failed`, {
      code: "source_failed",
      context: { source },
      cause,
    })
  }

  static validationFailed(
    pretty: string,
    issues: readonly IssueLike[],
    cause?: unknown,
  ): ConfigError {
    const formatted: ValidationIssue[] = issues.map((i) => ({
      path: formatPath(i.path),
      message: i.message,
    }))
    const context: ErrorContext = { issues: formatted }

    return new ConfigError(`Configuration validation failed:\n${pretty}`, {
      code: "validation_failed",
      context,
      cause,
    })
  }
}

export function isConfigError(err: unknown): err is ConfigError {
  return err instanceof ConfigError
}
