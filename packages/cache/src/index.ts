export {
  type MemoryCacheDeps,
  type MemoryCacheOptions,
  MemoryBytesCache,
} from "./adapters/memory/memory-bytes-cache"
export {
  RedisBytesCache,
  type RedisBytesCacheDeps,
  type RedisBytesCacheOptions,
} from "./adapters/redis/redis-bytes-cache"
export {
  createRedisBytesClient,
  type RedisBytesClient,
  type RedisBytesClientOptions,
} from "./adapters/redis/redis-client"
export {
  assertTagged,
  CacheError,
  type CacheErrorCode,
  type CacheOp,
} from "./core/cache-error"
export { CodecDataCache } from "./core/codec-data-cache"
export { createJsonCodec } from "./core/json-codec"
export { ReadThroughCache, type ReadThroughCacheDeps } from "./core/read-through-cache"
export type { BytesCache } from "./ports/bytes-cache"
export type { CacheKey } from "./ports/cache-key"
export type { CacheSetOptions, CacheTtl } from "./ports/cache-options"
export {
  type CacheHit,
  type CacheMiss,
  type CacheResult,
  cacheHit,
  cacheMiss,
} from "./ports/cache-result"
export type { CacheTag } from "./ports/cache-tag"
export type { Codec } from "./ports/codec"
export type { DataCache } from "./ports/data-cache"
export type { KeyspacePrefix } from "./ports/keyspace-prefix"
export type { ReadThrough } from "./ports/read-through"
export type { TagGenerations } from "./ports/tag-generations"
