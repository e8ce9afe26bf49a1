/**
 * Validated configuration plus where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ SERVER_PORT: z._default(z.coerce.number(), 4664) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.value.SERVER_PORT        // 4664
 * config.explain("SERVER_PORT")   // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /** Name of the source that supplied `key`, or `default` for schema defaults. */
  explain<K extends keyof T & string>(key: K): string

  /** Every source that supplied at least one value, in application order. */
  sourcesUsed(): string[]

  /** Keys some source provided that the schema does not know about. */
  unknownKeys(): string[]
}
