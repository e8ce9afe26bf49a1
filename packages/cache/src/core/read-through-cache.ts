import type { Logger } from "@tenantry/logger"
import type { CacheKey } from "../ports/cache-key"
import type { CacheSetOptions } from "../ports/cache-options"
import { cacheMiss, type CacheResult } from "../ports/cache-result"
import type { DataCache } from "../ports/data-cache"
import type { ReadThrough } from "../ports/read-through"
import type { TagGenerations } from "../ports/tag-generations"
import { assertTagged, CacheError } from "./cache-error"

export type ReadThroughCacheDeps<T> = {
  cache: DataCache<T>
  logger: Logger
}

/**
 * Read-through over a {@link DataCache}.
 *
 * Cache failures never fail the read: a broken `get` falls through to
 * `compute`, and a broken `set` is logged and the computed value returned.
 * Errors from `compute` propagate and nothing is stored.
 *
 * Tag generations are read before `compute` runs and the write is guarded by
 * them, so a value computed across an invalidation of its tags is returned
 * to this caller but never stored.
 */
export class ReadThroughCache<T> implements ReadThrough<T> {
  constructor(private readonly deps: ReadThroughCacheDeps<T>) {}

  async getOrCompute(
    key: CacheKey,
    opts: CacheSetOptions,
    compute: () => Promise<T>,
  ): Promise<T> {
    assertTagged(key, opts.tags)

    const cached = await this.tryGet(key)

    if (cached.kind === "hit") {
      this.deps.logger.trace("Cache hit", { key })
      return cached.value
    }

    const generations = await this.tryGenerations(key, opts)
    const value = await compute()

    if (generations !== undefined) {
      await this.trySet(key, value, { ...opts, unchangedSince: generations })
    }

    return value
  }

  private async tryGenerations(
    key: CacheKey,
    opts: CacheSetOptions,
  ): Promise<TagGenerations | undefined> {
    try {
      return await this.deps.cache.tagGenerations(opts.tags)
    } catch (err) {
      this.deps.logger.warn("Cache unavailable, result will not be stored", {
        key,
        tags: opts.tags,
        err: CacheError.unavailable("generations", key, err),
      })

      return undefined
    }
  }

  private async tryGet(key: CacheKey): Promise<CacheResult<T>> {
    try {
      return await this.deps.cache.get(key)
    } catch (err) {
      this.deps.logger.warn("Cache unavailable, reading from source", {
        key,
        err: CacheError.unavailable("get", key, err),
      })

      return cacheMiss
    }
  }

  private async trySet(key: CacheKey, value: T, opts: CacheSetOptions): Promise<void> {
    try {
      await this.deps.cache.set(key, value, opts)
    } catch (err) {
      this.deps.logger.warn("Cache unavailable, result not stored", {
        key,
        tags: opts.tags,
        err: CacheError.unavailable("set", key, err),
      })
    }
  }
}
