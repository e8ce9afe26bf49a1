import type { CacheTag } from "./cache-tag"

/**
 * Per-tag invalidation markers read before a value is computed.
 *
 * @remarks
 * A tag's marker changes every time the tag is invalidated. Markers are only
 * compared for equality; their magnitude means nothing across backends.
 */
export type TagGenerations = ReadonlyMap<CacheTag, number>
