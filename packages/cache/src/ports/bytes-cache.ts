import type { CacheKey } from "./cache-key"
import type { CacheSetOptions } from "./cache-options"
import type { CacheResult } from "./cache-result"
import type { CacheTag } from "./cache-tag"
import type { TagGenerations } from "./tag-generations"

/**
 * Tag-capable byte cache.
 *
 * @remarks
 * The cache holds derived data only. Any entry may disappear at any time, and
 * callers must be able to rebuild it from the source of truth.
 */
export interface BytesCache {
  get(key: CacheKey): Promise<CacheResult<Uint8Array>>

  /**
   * Overwrites any existing entry, including its tags. With
   * `opts.unchangedSince`, the check and the write happen as one step.
   */
  set(key: CacheKey, value: Uint8Array, opts: CacheSetOptions): Promise<void>

  invalidate(key: CacheKey): Promise<void>

  /**
   * Removes every entry carrying any of `tags`. Invalidating a tag with no
   * entries is a no-op, so repeating a call has no further effect.
   */
  invalidateTags(tags: readonly CacheTag[]): Promise<void>

  /** Current generation of each tag, for a later guarded `set`. */
  tagGenerations(tags: readonly CacheTag[]): Promise<TagGenerations>
}
