import type { Milliseconds } from "@tenantry/clock"

export interface LifecycleHookContext {
  /** Fires once the phase deadline passes. */
  readonly signal: AbortSignal
  readonly timeRemainingMs: Milliseconds
}

/** A named step run before the server listens or after it stops listening. */
export interface LifecycleHook {
  readonly name: string
  fn(ctx: LifecycleHookContext): Promise<void>
}

export type HookFailure = {
  readonly hook: string
  readonly error: unknown
}
