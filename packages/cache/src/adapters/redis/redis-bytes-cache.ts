import type { Clock, Milliseconds } from "@tenantry/clock"
import { assertTagged, CacheError } from "../../core/cache-error"
import { withDeadline } from "../../core/deadline"
import { remainingMs } from "../../core/ttl"
import type { BytesCache } from "../../ports/bytes-cache"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions } from "../../ports/cache-options"
import { cacheHit, cacheMiss, type CacheResult } from "../../ports/cache-result"
import type { CacheTag } from "../../ports/cache-tag"
import type { KeyspacePrefix } from "../../ports/keyspace-prefix"
import type { TagGenerations } from "../../ports/tag-generations"
import type { RedisBytesClient } from "./redis-client"
import { INVALIDATE_TAGS_SCRIPT, SET_TAGGED_SCRIPT } from "./redis-scripts"

export type RedisBytesCacheDeps = {
  client: RedisBytesClient
  clock: Clock
}

export type RedisBytesCacheOptions = {
  keyspacePrefix: KeyspacePrefix

  /**
   * Maximum keys per DEL issued while invalidating a tag. Keeps single
   * commands small for tags with many entries.
   *
   * @default 500
   */
  deleteBatchSize?: number

  /**
   * Longest wait for any single command. A stalled server then fails the
   * call with `cache_timeout` instead of holding it open.
   *
   * @default 1000
   */
  commandTimeoutMs?: Milliseconds
}

const DEFAULT_DELETE_BATCH_SIZE = 500
const DEFAULT_COMMAND_TIMEOUT_MS = 1_000

/**
 * Redis-backed tag-capable cache.
 *
 * Entries live at `<prefix><key>`; each tag is a Redis set at
 * `<prefix>tag:<tag>` listing the full keys of its entries, and a counter at
 * `<prefix>gen:<tag>` counts its invalidations. Writes and tag invalidations
 * each run as one script, so a tag set, its counter and its entries change
 * together. All keys touched by one call must hash to the same node.
 *
 * Counters carry no expiry: one small key per invalidated tag.
 */
export class RedisBytesCache implements BytesCache {
  private readonly deleteBatchSize: number
  private readonly commandTimeoutMs: Milliseconds

  constructor(
    private readonly deps: RedisBytesCacheDeps,
    private readonly opts: RedisBytesCacheOptions,
  ) {
    this.deleteBatchSize = opts.deleteBatchSize ?? DEFAULT_DELETE_BATCH_SIZE
    this.commandTimeoutMs = opts.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS
  }

  async get(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    const buffer = await this.bounded("GET", this.deps.client.get(this.fullKey(key)))

    if (buffer === null) return cacheMiss

    return cacheHit(new Uint8Array(buffer))
  }

  async set(key: CacheKey, value: Uint8Array, opts: CacheSetOptions): Promise<void> {
    assertTagged(key, opts.tags)

    const ttlMs = opts.ttl ? remainingMs(opts.ttl, this.deps.clock.nowMs()) : 0

    if (opts.ttl && ttlMs <= 0) {
      await this.invalidate(key)
      return
    }

    const guarded = [...(opts.unchangedSince ?? [])]

    await this.bounded(
      "EVAL",
      this.deps.client.eval(SET_TAGGED_SCRIPT, {
        keys: [
          this.fullKey(key),
          ...this.tagKeys(opts.tags),
          ...guarded.map(([tag]) => this.generationKey(tag)),
        ],
        arguments: [
          Buffer.from(value),
          String(Math.ceil(ttlMs)),
          ...guarded.map(([, generation]) => String(generation)),
        ],
      }),
    )
  }

  async invalidate(key: CacheKey): Promise<void> {
    await this.bounded("DEL", this.deps.client.del(this.fullKey(key)))
  }

  async invalidateTags(tags: readonly CacheTag[]): Promise<void> {
    if (tags.length === 0) return

    const unique = [...new Set(tags)]

    await this.bounded(
      "EVAL",
      this.deps.client.eval(INVALIDATE_TAGS_SCRIPT, {
        keys: [...this.tagKeys(unique), ...unique.map((tag) => this.generationKey(tag))],
        arguments: [String(this.deleteBatchSize)],
      }),
    )
  }

  async tagGenerations(tags: readonly CacheTag[]): Promise<TagGenerations> {
    const unique = [...new Set(tags)]

    if (unique.length === 0) return new Map()

    const raw = await this.bounded(
      "MGET",
      this.deps.client.mGet(unique.map((tag) => this.generationKey(tag))),
    )

    return new Map(
      unique.map((tag, i): [CacheTag, number] => [tag, Number(raw[i]?.toString() ?? 0)]),
    )
  }

  private bounded<T>(command: string, work: Promise<T>): Promise<T> {
    return withDeadline(work, this.commandTimeoutMs, () =>
      CacheError.timedOut(command, this.commandTimeoutMs),
    )
  }

  private tagKeys(tags: readonly CacheTag[]): string[] {
    return [...new Set(tags)].map((tag) => `${this.opts.keyspacePrefix}tag:${tag}`)
  }

  private generationKey(tag: CacheTag): string {
    return `${this.opts.keyspacePrefix}gen:${tag}`
  }

  private fullKey(key: CacheKey): string {
    return `${this.opts.keyspacePrefix}${key}`
  }
}
