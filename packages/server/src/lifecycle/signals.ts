import type { EventEmitter } from "node:events"
import type { Logger } from "@tenantry/logger"
import type { StopResult } from "./shutdown"

export interface SignalHandlerContext {
  logger: Logger
  stop: () => Promise<StopResult>

  /** @default 10_000 */
  fatalTimeoutMs?: number

  /** @default process.exit */
  exit?: (code: number) => void

  /** Where signals and fatal errors are observed. @default process */
  target?: EventEmitter
}

export interface SignalHandler {
  unregister: () => void
}

/**
 * Registers SIGINT/SIGTERM for graceful shutdown, and stops then exits on an
 * uncaught exception or unhandled rejection. A second fatal error while
 * stopping exits at once.
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const fatalTimeoutMs = ctx.fatalTimeoutMs ?? 10_000
  const exit = ctx.exit ?? ((code: number) => process.exit(code))
  const target: EventEmitter = ctx.target ?? process

  let stopping = false

  const onSignal = (signal: NodeJS.Signals) => {
    ctx.logger.info("Received signal", { signal })

    if (stopping) return
    stopping = true

    ctx.logger.warn("Shutdown triggered", { reason: signal })

    void runStop(ctx, signal)
  }

  const onFatal = (reason: string, err: unknown) => {
    if (stopping) {
      ctx.logger.fatal("Fatal error during shutdown", { reason, err })
      exit(1)
      return
    }

    stopping = true

    ctx.logger.fatal("Fatal error", { reason, err })

    const timer = setTimeout(() => {
      ctx.logger.fatal("Forced exit after timeout", { timeoutMs: fatalTimeoutMs })
      exit(1)
    }, fatalTimeoutMs)

    timer.unref()

    void runStop(ctx, reason).finally(() => {
      clearTimeout(timer)
      exit(1)
    })
  }

  const sigintHandler = () => onSignal("SIGINT")
  const sigtermHandler = () => onSignal("SIGTERM")
  const uncaughtHandler = (err: Error) => onFatal("uncaughtException", err)
  const rejectionHandler = (reason: unknown) => onFatal("unhandledRejection", reason)

  target.on("SIGINT", sigintHandler)
  target.on("SIGTERM", sigtermHandler)
  target.on("uncaughtException", uncaughtHandler)
  target.on("unhandledRejection", rejectionHandler)

  return {
    unregister: () => {
      target.off("SIGINT", sigintHandler)
      target.off("SIGTERM", sigtermHandler)
      target.off("uncaughtException", uncaughtHandler)
      target.off("unhandledRejection", rejectionHandler)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers

async function runStop(ctx: SignalHandlerContext, reason: string): Promise<void> {
  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failureCount: result.failures.length,
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}
