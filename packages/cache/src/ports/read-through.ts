import type { CacheKey } from "./cache-key"
import type { CacheSetOptions } from "./cache-options"

export interface ReadThrough<T> {
  /**
   * Returns the cached value for `key`, or runs `compute`, stores its result
   * under `opts` and returns it.
   */
  getOrCompute(key: CacheKey, opts: CacheSetOptions, compute: () => Promise<T>): Promise<T>
}
