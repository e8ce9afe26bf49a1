import type { EvictionMap } from "./eviction-map"

/**
 * Recency is kept in Map insertion order. Re-inserting a key moves it to the
 * back, so the front key is always the least recently used.
 */
export class LruMemoryMap<K, V> implements EvictionMap<K, V> {
  private readonly entries = new Map<K, V>()

  get(key: K): V | undefined {
    if (!this.entries.has(key)) return undefined

    const value = this.entries.get(key)
    if (value !== undefined) this.touch(key, value)

    return value
  }

  peek(key: K): V | undefined {
    return this.entries.get(key)
  }

  set(key: K, value: V): void {
    this.touch(key, value)
  }

  delete(key: K): boolean {
    return this.entries.delete(key)
  }

  has(key: K): boolean {
    return this.entries.has(key)
  }

  size(): number {
    return this.entries.size
  }

  victim(): K | undefined {
    const oldest = this.entries.keys().next()
    return oldest.done ? undefined : oldest.value
  }

  private touch(key: K, value: V): void {
    this.entries.delete(key)
    this.entries.set(key, value)
  }
}
