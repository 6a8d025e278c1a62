import { isAppError, serializeError } from "@nscache/errors"
import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { LogLevelName } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /**
   * Pino logger to derive from. When set, this adapter only adds its context
   * through `.child()` and inherits level and destination from `base`.
   */
  base?: PinoLoggerBase

  /**
   * Where to write JSON lines. Takes precedence over `prettify`, which needs a
   * transport of its own.
   */
  destination?: DestinationStream
}

function serializeErr(value: unknown): unknown {
  if (isAppError(value)) return serializeError(value, { includeStack: true })
  if (value instanceof Error) return errWithCause(value)

  return value
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  protected readonly logger: PinoLoggerBase

  constructor(
    protected readonly deps: Readonly<PinoLoggerDeps> = {},
    protected readonly opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
  ) {
    this.logger = this.init(context)
  }

  private init(context: LogContextPatch): PinoLoggerBase {
    if (this.deps.base) return this.deps.base.child(context)

    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: serializeErr },
    }

    if (this.deps.destination) {
      return pino(pinoOpts, this.deps.destination).child(context)
    }

    if (this.opts.prettify) {
      pinoOpts.transport = {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss.l", ignore: "hostname" },
      }
    }

    return pino(pinoOpts).child(context)
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    this.logger[level](meta ?? {}, message)
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

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>({ base: this.logger }, this.opts, context)
  }
}

export function createPinoLogger<TContext extends LogContext = LogContext>(
  deps: PinoLoggerDeps = {},
  opts: Partial<LoggerOptions> = {},
  context: LogContextPatch = {},
): Logger<TContext> {
  return new PinoLogger<TContext>(deps, opts, context)
}
