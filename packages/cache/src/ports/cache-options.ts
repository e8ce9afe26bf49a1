import type { Milliseconds, Seconds } from "@tenantry/clock"
import type { CacheTag } from "./cache-tag"
import type { TagGenerations } from "./tag-generations"

type SecondsTtl = { kind: "seconds"; seconds: Seconds }
type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }
type UntilDateTtl = { kind: "until"; expiresAt: Date }

export type CacheTtl = SecondsTtl | MillisecondsTtl | UntilDateTtl

export type CacheSetOptions = {
  /** Omit to keep the entry until it is evicted or invalidated. */
  ttl?: CacheTtl

  /** At least one tag. Untagged writes are rejected. */
  tags: readonly CacheTag[]

  /**
   * Generations read before the value was computed. The write is dropped when
   * any of these tags has been invalidated since.
   */
  unchangedSince?: TagGenerations
}
