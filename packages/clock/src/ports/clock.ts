import type { Milliseconds } from "./time"

/**
 * Source of the current time.
 *
 * @remarks
 * Anything that computes expiry or deadlines takes a Clock instead of calling
 * `Date.now()`, so tests can move time explicitly.
 */
export interface Clock {
  /** Current time as a Date. Prefer `nowMs()` for arithmetic. */
  now(): Date

  /** Current time as milliseconds since the Unix epoch. */
  nowMs(): Milliseconds
}
