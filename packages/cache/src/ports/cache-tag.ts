/**
 * Label attached to cache entries so they can be dropped as a group.
 *
 * @remarks
 * Both coarse tags (`tasks`) and per-record tags (`tasks:42`) are expected.
 * Invalidating a tag removes every entry that carries it.
 */
export type CacheTag = string
