import pino, {
  type DestinationStream,
  type Logger as PinoBaseLogger,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { LogLevelName } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type PinoLoggerDeps = {
  /** Existing pino instance to derive from; used by `child()`. */
  base?: PinoBaseLogger

  /** Where JSON lines go. Defaults to stdout. Ignored when `prettify` is on. */
  destination?: DestinationStream
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly logger: PinoBaseLogger

  constructor(
    private readonly deps: PinoLoggerDeps,
    private readonly opts: LoggerOptions,
    context: LogContextPatch = {},
  ) {
    this.logger = (deps.base ?? this.createBase()).child(context)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.emit("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.emit("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.emit("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.emit("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.emit("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.emit("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>(
      { ...this.deps, base: this.logger },
      this.opts,
      context,
    )
  }

  private emit(level: LogLevelName, message: string, meta: LogMeta<TContext> | undefined): void {
    this.logger[level]({ ...meta }, message)
  }

  private createBase(): PinoBaseLogger {
    const pinoOpts: PinoOptions = {
      level: this.opts.level,
      serializers: { err: errWithCause },
      ...(this.opts.prettify && {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "hostname",
          },
        },
      }),
    }

    if (this.deps.destination && !this.opts.prettify) {
      return pino(pinoOpts, this.deps.destination)
    }

    return pino(pinoOpts)
  }
}

export function createPinoLogger(
  deps: PinoLoggerDeps,
  opts: LoggerOptions,
  context: LogContextPatch = {},
): Logger {
  return new PinoLogger(deps, opts, context)
}
