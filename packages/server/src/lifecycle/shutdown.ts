import type { Clock, Milliseconds } from "@tenantry/clock"
import type { Logger } from "@tenantry/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runPhase } from "./run-phase"

export interface Closeable {
  close: (callback?: (err?: Error | null) => void) => void
}

export type ShutdownContext = {
  server: Closeable
  clock: Clock
  logger: Logger
  deadlineMs: Milliseconds
  stopHooks: readonly LifecycleHook[]
}

export type StopResult = {
  /** True when nothing failed and the deadline held. */
  ok: boolean
  failures: HookFailure[]

  /** Open sockets are left as they are once this is set. */
  timedOut: boolean
}

/**
 * Closes the listener, then runs every stop hook regardless of earlier
 * failures.
 */
export async function shutdown({
  server,
  stopHooks,
  ...options
}: ShutdownContext): Promise<StopResult> {
  options.logger.warn("Shutting down gracefully...")

  const { completed, skipped, failures, timedOut } = await runPhase(
    "shutdown",
    [closeListener(server), ...stopHooks],
    options,
  )

  options.logger.info("Shutdown complete", { completed, skipped })

  return { ok: !timedOut && failures.length === 0, failures, timedOut }
}

export type ShutdownFn = typeof shutdown

/** Resolves early, without error, if the phase is aborted first. */
function closeListener(server: Closeable): LifecycleHook {
  return {
    name: "server.close",
    fn: ({ signal }) =>
      new Promise<void>((resolve, reject) => {
        if (signal.aborted) {
          resolve()
          return
        }

        const onAbort = () => resolve()
        signal.addEventListener("abort", onAbort, { once: true })

        server.close((err) => {
          signal.removeEventListener("abort", onAbort)
          if (err) reject(err)
          else resolve()
        })
      }),
  }
}
