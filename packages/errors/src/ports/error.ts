/**
 * Machine-readable error code, lowercase by convention (e.g. `cache_set_failed`).
 */
export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error (keys, modes, inputs).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if the same call may succeed when repeated. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad input, a miss, a backend outage),
   * `false` for programmer errors and broken invariants.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used by loggers and anything that ships errors across
 * a process boundary.
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
