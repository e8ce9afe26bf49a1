/**
 * Quotes an identifier, keeping a schema qualifier: `public.tasks` becomes
 * `"public"."tasks"`.
 */
export function quoteIdent(name: string): string {
  return name
    .split(".")
    .map((part) => `"${part.replaceAll('"', '""')}"`)
    .join(".")
}

/** Escapes LIKE wildcards so the term matches literally. */
export function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`)
}

/**
 * Collects positional parameters while a statement is assembled.
 */
export class Params {
  readonly values: unknown[] = []

  add(value: unknown): string {
    this.values.push(value)
    return `$${this.values.length}`
  }
}
