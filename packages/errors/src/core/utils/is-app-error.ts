import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Structural check for {@link AppError}; matches errors created by other
 * copies of this package as well as `BaseError` instances.
 *
 * @example
 * ```ts
 * try {
 *   await store.get("user:1")
 * } catch (err) {
 *   if (isAppError(err) && err.isRetryable) scheduleRetry()
 *   else throw err
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    e.timestamp instanceof Date &&
    Number.isFinite(e.timestamp.valueOf()) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
