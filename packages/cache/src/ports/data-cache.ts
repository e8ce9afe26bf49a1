import type { CacheKey } from "./cache-key"
import type { CacheSetOptions } from "./cache-options"
import type { CacheResult } from "./cache-result"
import type { CacheTag } from "./cache-tag"
import type { TagGenerations } from "./tag-generations"

/**
 * Typed view over a {@link BytesCache}.
 */
export interface DataCache<T> {
  get(key: CacheKey): Promise<CacheResult<T>>
  set(key: CacheKey, value: T, opts: CacheSetOptions): Promise<void>
  invalidate(key: CacheKey): Promise<void>
  invalidateTags(tags: readonly CacheTag[]): Promise<void>
  tagGenerations(tags: readonly CacheTag[]): Promise<TagGenerations>
}
