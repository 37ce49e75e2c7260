import { BaseError } from "@groundwork/errors"

export type ContextErrorCode = "missing_config"

export class ContextError extends BaseError<ContextErrorCode> {
  static missingConfig(): ContextError {
    return new ContextError("Cannot build an application context without a configuration", {
      code: "missing_config",
      isOperational: false,
    })
  }
}
