import type { FilterKind } from "./filters"
import type { StoredRecord } from "./record"

export type FieldName<R> = keyof R & string

export type FilterDefinition<R> = {
  kind: FilterKind
  field: FieldName<R>
}

export type OrderBy<R> = {
  field: FieldName<R>
  direction: "asc" | "desc"
}

export type RecordTypeInput<R extends StoredRecord> = {
  /** Record type name. Also the collection cache tag. */
  name: string

  /** @default "user_id" */
  ownerField?: FieldName<R>

  /** Accepted filter names. Anything else is dropped. */
  filters?: Readonly<Record<string, FilterDefinition<R>>>

  /** Insertion order (memory) or id order (Postgres) when omitted. */
  orderBy?: OrderBy<R>

  /**
   * Turns a stored row into `R`, applying attribute defaults. Throws on rows
   * that do not fit.
   */
  parse: (value: unknown) => R
}

export type RecordTypeDefinition<R extends StoredRecord> = Readonly<{
  name: string
  ownerField: string
  filters: Readonly<Record<string, FilterDefinition<R>>>
  orderBy?: OrderBy<R>
  parse: (value: unknown) => R
}>
