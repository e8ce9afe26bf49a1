import type { BytesCache } from "../ports/bytes-cache"
import type { CacheKey } from "../ports/cache-key"
import type { CacheSetOptions } from "../ports/cache-options"
import { cacheHit, type CacheResult } from "../ports/cache-result"
import type { CacheTag } from "../ports/cache-tag"
import type { Codec } from "../ports/codec"
import type { DataCache } from "../ports/data-cache"
import type { TagGenerations } from "../ports/tag-generations"

export class CodecDataCache<T> implements DataCache<T> {
  constructor(
    private readonly bytesCache: BytesCache,
    private readonly codec: Codec<T>,
  ) {}

  async get(key: CacheKey): Promise<CacheResult<T>> {
    const res = await this.bytesCache.get(key)

    if (res.kind === "miss") return res

    return cacheHit(this.codec.decode(res.value))
  }

  async set(key: CacheKey, value: T, opts: CacheSetOptions): Promise<void> {
    await this.bytesCache.set(key, this.codec.encode(value), opts)
  }

  async invalidate(key: CacheKey): Promise<void> {
    await this.bytesCache.invalidate(key)
  }

  async invalidateTags(tags: readonly CacheTag[]): Promise<void> {
    await this.bytesCache.invalidateTags(tags)
  }

  async tagGenerations(tags: readonly CacheTag[]): Promise<TagGenerations> {
    return this.bytesCache.tagGenerations(tags)
  }
}
