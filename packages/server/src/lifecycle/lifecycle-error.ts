import { BaseError } from "@tenantry/errors"
import type { PhaseOutcome } from "./run-phase"

export class StartupError extends BaseError<"startup_failed"> {
  static fromOutcome(outcome: PhaseOutcome): StartupError {
    const [first] = outcome.failures

    return new StartupError(
      first
        ? `Server startup aborted: hook ${first.hook} failed`
        : "Server startup aborted: deadline exceeded",
      {
        code: "startup_failed",
        context: {
          failed: outcome.failures.map(({ hook }) => hook),
          skipped: outcome.skipped,
          timedOut: outcome.timedOut,
        },
        cause: first?.error,
        isOperational: false,
      },
    )
  }
}
