/**
 * Opaque cache key. Adapters prepend their keyspace prefix and never parse it.
 *
 * @example
 * ```ts
 * const key: CacheKey = "tasks:item:42"
 * ```
 */
export type CacheKey = string
