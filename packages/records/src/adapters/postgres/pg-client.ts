import { Pool } from "pg"

/**
 * The part of a `pg` Pool or client the store uses.
 */
export type PgQueryable = {
  query: (
    sql: string,
    params?: unknown[],
  ) => Promise<{ rows: Array<Record<string, unknown>> }>
}

export function createPgPool(options: { connectionString: string }): Pool {
  return new Pool({
    connectionString: options.connectionString,
  })
}
