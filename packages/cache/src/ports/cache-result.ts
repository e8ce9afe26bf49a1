/** A lookup outcome. A hit may carry any value, including `null`. */
export type CacheResult<T> = CacheHit<T> | CacheMiss

export type CacheHit<T> = Readonly<{ kind: "hit"; value: T }>

export type CacheMiss = Readonly<{ kind: "miss" }>

export const cacheMiss: CacheMiss = Object.freeze({ kind: "miss" })

export function cacheHit<T>(value: T): CacheHit<T> {
  return { kind: "hit", value }
}
