import type { Milliseconds } from "@tenantry/clock"
import type { CacheTtl } from "../ports/cache-options"

/**
 * Absolute expiry for `ttl`, measured from `nowMs`.
 */
export function expiresAtMs(ttl: CacheTtl, nowMs: Milliseconds): Milliseconds {
  switch (ttl.kind) {
    case "seconds":
      return nowMs + ttl.seconds * 1000
    case "milliseconds":
      return nowMs + ttl.milliseconds
    case "until":
      return ttl.expiresAt.getTime()
  }
}

/**
 * Remaining lifetime for `ttl`, never negative.
 */
export function remainingMs(ttl: CacheTtl, nowMs: Milliseconds): Milliseconds {
  return Math.max(0, expiresAtMs(ttl, nowMs) - nowMs)
}
