import type { Clock, Milliseconds } from "@tenantry/clock"
import type { Logger } from "@tenantry/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export interface PhaseOptions {
  clock: Clock
  logger: Logger
  deadlineMs: Milliseconds

  /** Skip the remaining hooks after the first failure. */
  failFast?: boolean
}

export interface PhaseOutcome {
  phase: HookPhase
  completed: string[]
  failures: HookFailure[]

  /** Hooks that never ran, because of the deadline or `failFast`. */
  skipped: string[]
  timedOut: boolean
}

// setTimeout treats anything larger as 1ms
const MAX_TIMER_MS = 2_147_483_647

/**
 * Runs a phase's hooks one at a time against a single deadline. All hooks
 * share one abort signal, fired when the deadline passes.
 */
export async function runPhase(
  phase: HookPhase,
  hooks: readonly LifecycleHook[],
  options: PhaseOptions,
): Promise<PhaseOutcome> {
  const { clock, logger, deadlineMs } = options
  const outcome: PhaseOutcome = {
    phase,
    completed: [],
    failures: [],
    skipped: [],
    timedOut: false,
  }

  const remainingMs = () => Math.max(0, deadlineMs - clock.nowMs())
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), Math.min(remainingMs(), MAX_TIMER_MS))
  const expired = () => controller.signal.aborted || remainingMs() === 0
  const label = phase === "startup" ? "Startup" : "Shutdown"

  try {
    for (const [index, hook] of hooks.entries()) {
      if (expired()) {
        outcome.timedOut = true
        outcome.skipped = hooks.slice(index).map((h) => h.name)
        logger.warn(`Skipping remaining ${phase} hooks due to timeout`, {
          skipped: outcome.skipped,
        })
        break
      }

      const failure = await attempt(hook, controller.signal, remainingMs())
      const late = expired()

      if (failure) {
        outcome.failures.push(failure)
        logger.error(`${label} hook failed: ${hook.name}`, { err: failure.error })
      } else if (late) {
        logger.warn(`${label} deadline exceeded during hook: ${hook.name}`)
      } else {
        outcome.completed.push(hook.name)
        logger.info(`Executed ${phase} hook: ${hook.name}`)
      }

      if (late || (failure && options.failFast)) {
        outcome.timedOut = late
        outcome.skipped = hooks.slice(index + 1).map((h) => h.name)
        break
      }
    }
  } finally {
    clearTimeout(timer)
  }

  return outcome
}

/**
 * Settles with the hook, or once the signal has aborted and the hook still has
 * not settled by the next macrotask. A hook that ignores its signal is left
 * running and its outcome dropped.
 */
async function attempt(
  hook: LifecycleHook,
  signal: AbortSignal,
  timeRemainingMs: Milliseconds,
): Promise<HookFailure | undefined> {
  let run: Promise<HookFailure | undefined>

  try {
    run = hook.fn({ signal, timeRemainingMs }).then(
      () => undefined,
      (error: unknown) => ({ hook: hook.name, error }),
    )
  } catch (error) {
    return { hook: hook.name, error }
  }

  return Promise.race([run, abandoned(signal)])
}

function abandoned(signal: AbortSignal): Promise<undefined> {
  return new Promise((resolve) => {
    const release = () => setTimeout(() => resolve(undefined), 0)

    if (signal.aborted) {
      release()
      return
    }

    signal.addEventListener("abort", release, { once: true })
  })
}
