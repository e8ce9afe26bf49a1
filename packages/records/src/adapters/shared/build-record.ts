import type { RecordData, RecordId, StoredRecord } from "../../ports/record"
import type { RecordTypeDefinition } from "../../ports/record-type"

/** Caller attributes minus `id`, the owner field and `undefined` values. */
export function writableAttributes<R extends StoredRecord>(
  definition: RecordTypeDefinition<R>,
  data: RecordData<R>,
): Record<string, unknown> {
  const out: Record<string, unknown> = {}

  for (const [field, value] of Object.entries(data)) {
    if (value === undefined) continue
    if (field === "id" || field === definition.ownerField) continue

    out[field] = value
  }

  return out
}

/** A complete new record: defaults applied, id and owner assigned. */
export function buildNewRecord<R extends StoredRecord>(
  definition: RecordTypeDefinition<R>,
  id: RecordId,
  ownerId: string,
  data: RecordData<R>,
): R {
  return definition.parse({
    ...writableAttributes(definition, data),
    id,
    [definition.ownerField]: ownerId,
  })
}
