/**
 * A source of raw configuration values.
 *
 * Sources only load. Coercion and validation happen in `loadConfig`, and
 * later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. `env` or `dotenv:.env.test`. */
  readonly name: string

  /** Flat key/value pairs. An `undefined` value means "not provided". */
  load(): Promise<Record<string, unknown>>
}
