export type RecordId = string

/** Any persisted row: an id plus attributes. */
export type StoredRecord = { readonly id: RecordId } & Readonly<Record<string, unknown>>

/**
 * Caller-supplied attributes for insert or update. `id` and the owner field are
 * ignored if present; `undefined` values are skipped.
 */
export type RecordData<R extends StoredRecord> = {
  [K in Exclude<keyof R, "id">]?: R[K] | undefined
}
