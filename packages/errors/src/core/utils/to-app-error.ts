import type { AppError, ErrorCode } from "../../ports/error"
import { BaseError } from "../base-error"
import { isAppError } from "./is-app-error"

/**
 * Normalize a caught value into an {@link AppError}.
 *
 * AppErrors pass through untouched. Anything else is wrapped as a
 * non-operational error under `fallbackCode`.
 */
export function toAppError(err: unknown, fallbackCode: ErrorCode = "unknown"): AppError {
  if (isAppError(err)) return err

  if (err instanceof Error) {
    return new BaseError(err.message, {
      code: fallbackCode,
      cause: err,
      isOperational: false,
    })
  }

  const message = typeof err === "string" ? err : "Unknown error"

  return new BaseError(message, {
    code: fallbackCode,
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
  })
}
