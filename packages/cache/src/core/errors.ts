import { BaseError, type ErrorContext } from "@nscache/errors"
import type { Milliseconds } from "../ports/time"

export type CacheErrorCode =
  | "cache_invalid_expiry"
  | "cache_set_failed"
  | "cache_key_not_found"
  | "cache_get_failed"
  | "cache_instrumentation_failed"

export type KeyErrorContext = ErrorContext & { key: string }

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

export class InvalidExpiryError extends BaseError<"cache_invalid_expiry"> {
  declare readonly context: ErrorContext & { expiry: Milliseconds }

  constructor(expiry: Milliseconds) {
    super("invalid parameter expiry: must be greater than zero", {
      code: "cache_invalid_expiry",
      context: { expiry },
    })
  }
}

export class SetError extends BaseError<"cache_set_failed"> {
  declare readonly context: KeyErrorContext

  constructor(key: string, cause: unknown) {
    super(
      `an internal error occurred: could not set value under key "${key}": ${describeCause(cause)}`,
      { code: "cache_set_failed", context: { key }, cause, isRetryable: true },
    )
  }
}

export class KeyNotFoundError extends BaseError<"cache_key_not_found"> {
  declare readonly context: KeyErrorContext

  constructor(key: string) {
    super(`cache value was not found with key: ${key}`, {
      code: "cache_key_not_found",
      context: { key },
    })
  }
}

export class GetError extends BaseError<"cache_get_failed"> {
  declare readonly context: KeyErrorContext

  constructor(key: string, cause: unknown) {
    super(
      `an internal error occurred: could not get value under key "${key}": ${describeCause(cause)}`,
      { code: "cache_get_failed", context: { key }, cause, isRetryable: true },
    )
  }
}

/**
 * An instrumentation hook rejected the driver client it was given. This is a
 * wiring bug, never a runtime condition, so it is marked non-operational.
 */
export class RedisInstrumentationError extends BaseError<"cache_instrumentation_failed"> {
  declare readonly context: ErrorContext & { mode: string }

  constructor(mode: string, cause: unknown) {
    super(`failed to instrument redis ${mode} client`, {
      code: "cache_instrumentation_failed",
      context: { mode },
      cause,
      isOperational: false,
    })
  }
}

export function isKeyNotFound(err: unknown): err is KeyNotFoundError {
  return err instanceof KeyNotFoundError
}
