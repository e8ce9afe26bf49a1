import type { Clock, Milliseconds } from "@tenantry/clock"
import { assertTagged } from "../../core/cache-error"
import type { EvictionMap } from "../../core/eviction/eviction-map"
import { LruMemoryMap } from "../../core/eviction/lru-memory-map"
import { expiresAtMs } from "../../core/ttl"
import type { BytesCache } from "../../ports/bytes-cache"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions } from "../../ports/cache-options"
import { cacheHit, cacheMiss, type CacheResult } from "../../ports/cache-result"
import type { CacheTag } from "../../ports/cache-tag"
import type { TagGenerations } from "../../ports/tag-generations"

export type MemoryCacheOptions = {
  /**
   * Upper bound on live entries; the least recently used entry goes first.
   * Also bounds how many tag generations are remembered.
   */
  maxEntries: number
}

export type MemoryCacheDeps = {
  clock: Clock
  store?: EvictionMap<CacheKey, MemoryCacheEntry>
}

export type MemoryCacheEntry = {
  value: Uint8Array
  tags: readonly CacheTag[]
  expiresAtMs?: Milliseconds
}

/**
 * In-process tag-capable cache.
 *
 * Keeps a tag -> keys index next to the entries. The index is updated on
 * every overwrite, eviction, expiry and invalidation, so it never points at a
 * key whose current entry does not carry the tag.
 *
 * Each invalidated tag is stamped with the next value of a shared counter.
 * When too many stamps are held, the oldest is dropped and becomes the floor
 * reported for every tag without a stamp, so a forgotten tag still compares
 * unequal to any snapshot taken before it was last invalidated.
 */
export class MemoryBytesCache implements BytesCache {
  private readonly store: EvictionMap<CacheKey, MemoryCacheEntry>
  private readonly tagIndex = new Map<CacheTag, Set<CacheKey>>()
  private readonly generations = new Map<CacheTag, number>()
  private epoch = 0
  private floor = 0

  constructor(
    private readonly deps: MemoryCacheDeps,
    private readonly opts: MemoryCacheOptions,
  ) {
    if (!Number.isInteger(opts.maxEntries) || opts.maxEntries < 1) {
      throw new RangeError(`maxEntries must be a positive integer, got ${opts.maxEntries}`)
    }

    this.store = deps.store ?? new LruMemoryMap()
  }

  async get(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    const entry = this.store.get(key)

    if (entry === undefined) return cacheMiss

    if (this.isExpired(entry)) {
      this.remove(key)
      return cacheMiss
    }

    return cacheHit(entry.value)
  }

  async set(key: CacheKey, value: Uint8Array, opts: CacheSetOptions): Promise<void> {
    assertTagged(key, opts.tags)

    if (opts.unchangedSince && this.movedSince(opts.unchangedSince)) return

    this.remove(key)

    const entry: MemoryCacheEntry = {
      value,
      tags: [...new Set(opts.tags)],
      ...(opts.ttl && { expiresAtMs: expiresAtMs(opts.ttl, this.deps.clock.nowMs()) }),
    }

    if (this.isExpired(entry)) return

    this.ensureCapacity()
    this.store.set(key, entry)

    for (const tag of entry.tags) {
      const keys = this.tagIndex.get(tag) ?? new Set<CacheKey>()
      keys.add(key)
      this.tagIndex.set(tag, keys)
    }
  }

  async invalidate(key: CacheKey): Promise<void> {
    this.remove(key)
  }

  async invalidateTags(tags: readonly CacheTag[]): Promise<void> {
    for (const tag of tags) {
      this.stamp(tag)

      const keys = this.tagIndex.get(tag)

      if (keys === undefined) continue

      for (const key of [...keys]) {
        this.remove(key)
      }

      this.tagIndex.delete(tag)
    }
  }

  async tagGenerations(tags: readonly CacheTag[]): Promise<TagGenerations> {
    return new Map(tags.map((tag): [CacheTag, number] => [tag, this.generationOf(tag)]))
  }

  /** Number of live and not-yet-collected expired entries. */
  size(): number {
    return this.store.size()
  }

  private remove(key: CacheKey): void {
    const entry = this.store.peek(key)

    if (entry === undefined) return

    this.store.delete(key)

    for (const tag of entry.tags) {
      const keys = this.tagIndex.get(tag)

      if (keys === undefined) continue

      keys.delete(key)

      if (keys.size === 0) this.tagIndex.delete(tag)
    }
  }

  private ensureCapacity(): void {
    while (this.store.size() >= this.opts.maxEntries) {
      const victim = this.store.victim()

      if (victim === undefined) return

      this.remove(victim)
    }
  }

  private generationOf(tag: CacheTag): number {
    return this.generations.get(tag) ?? this.floor
  }

  private movedSince(snapshot: TagGenerations): boolean {
    for (const [tag, generation] of snapshot) {
      if (this.generationOf(tag) !== generation) return true
    }

    return false
  }

  private stamp(tag: CacheTag): void {
    this.epoch += 1
    this.generations.delete(tag)
    this.generations.set(tag, this.epoch)

    if (this.generations.size <= this.opts.maxEntries) return

    const oldest = this.generations.entries().next()

    if (oldest.done) return

    const [forgotten, generation] = oldest.value
    this.generations.delete(forgotten)
    this.floor = generation
  }

  private isExpired(entry: MemoryCacheEntry): boolean {
    if (entry.expiresAtMs === undefined) return false

    return entry.expiresAtMs <= this.deps.clock.nowMs()
  }
}
