import type { IConfig } from "../ports/config"

const DEFAULT_ORIGIN = "default"

/** Frozen, validated settings with the origin of every key. */
export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  readonly value: T
  private readonly origins: ReadonlyMap<string, string>
  private readonly provided: readonly string[]

  constructor(
    value: T,
    origins: Readonly<Record<string, string>>,
    providedKeys: Iterable<string>,
  ) {
    this.value = Object.freeze(value)
    this.origins = new Map(Object.entries(origins))
    this.provided = [...providedKeys]
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.origins.get(key) ?? DEFAULT_ORIGIN
  }

  sourcesUsed(): string[] {
    return Array.from(new Set(this.origins.values()))
  }

  unknownKeys(): string[] {
    return this.provided.filter((key) => !Object.hasOwn(this.value, key))
  }
}
