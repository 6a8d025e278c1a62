import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    Error.captureStackTrace?.(this, new.target)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Default: `false` */
  includeStack?: boolean
}>

/**
 * Serialize any thrown value into a {@link SerializedError}.
 *
 * `BaseError`s keep their code and context. Plain `Error`s get the code
 * `unknown` and are treated as non-operational, as is anything thrown that is
 * not an `Error` at all. Causes are serialized recursively.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isOperational: false,
      timestamp: new Date().toISOString(),
    }
  }

  const includeStack = options?.includeStack ?? false
  const known = err instanceof BaseError

  return {
    name: err.name,
    code: known ? err.code : "unknown",
    message: err.message,
    context: known ? { ...err.context } : {},
    isOperational: known ? err.isOperational : false,
    timestamp: (known ? err.timestamp : new Date()).toISOString(),
    ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
    ...(includeStack && err.stack && { stack: err.stack }),
  }
}
