import type { Clock, Milliseconds } from "@tenantry/clock"
import type { Logger } from "@tenantry/logger"
import { StartupError } from "./lifecycle-error"
import type { LifecycleHook } from "./lifecycle-hook"
import { runPhase } from "./run-phase"

export type StartupContext = {
  clock: Clock
  logger: Logger
  deadlineMs: Milliseconds
  startHooks: readonly LifecycleHook[]
}

/** Throws unless every start hook finished before the deadline. */
export async function startup({ startHooks, ...options }: StartupContext): Promise<void> {
  options.logger.debug("Running startup hooks...", { count: startHooks.length })

  const outcome = await runPhase("startup", startHooks, { ...options, failFast: true })

  if (outcome.timedOut || outcome.failures.length > 0) {
    throw StartupError.fromOutcome(outcome)
  }
}

export type StartupFn = typeof startup
