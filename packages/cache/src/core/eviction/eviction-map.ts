/**
 * Ordered key/value storage behind the memory cache. The implementation
 * decides which key is evicted next.
 */
export interface EvictionMap<K, V> {
  /** Returns the value and counts as a use for ordering purposes. */
  get(key: K): V | undefined

  /** Returns the value without touching ordering. */
  peek(key: K): V | undefined

  set(key: K, value: V): void
  delete(key: K): boolean
  has(key: K): boolean
  size(): number

  /** Next key to evict, or `undefined` when empty. */
  victim(): K | undefined
}
