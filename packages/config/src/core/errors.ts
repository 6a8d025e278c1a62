import { BaseError, type ErrorContext } from "@nscache/errors"

export type ConfigIssue = { path: string; message: string }

export type ConfigValidationErrorContext = ErrorContext & {
  issues: ConfigIssue[]
}

/**
 * Thrown by `loadConfig` when the merged sources do not satisfy the schema.
 * This is a deployment problem, so it is not retryable.
 */
export class ConfigValidationError extends BaseError<"config_invalid"> {
  declare readonly context: ConfigValidationErrorContext

  constructor(issues: ConfigIssue[], detail: string) {
    super(`Configuration validation failed:\n${detail}`, {
      code: "config_invalid",
      context: { issues },
    })
  }
}
