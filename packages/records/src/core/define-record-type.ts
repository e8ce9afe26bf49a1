import type { StoredRecord } from "../ports/record"
import type { RecordTypeDefinition, RecordTypeInput } from "../ports/record-type"

const DEFAULT_OWNER_FIELD = "user_id"

/**
 * Declares a record type once, at registration. The owner field and filters
 * are fixed here rather than discovered per call.
 */
export function defineRecordType<R extends StoredRecord>(
  input: RecordTypeInput<R>,
): RecordTypeDefinition<R> {
  if (input.name.trim().length === 0) {
    throw new TypeError("Record type name must not be empty")
  }

  const ownerField = input.ownerField ?? DEFAULT_OWNER_FIELD

  if (ownerField === "id") {
    throw new TypeError(`${input.name}: the owner field cannot be the id`)
  }

  return Object.freeze({
    name: input.name,
    ownerField,
    filters: Object.freeze({ ...input.filters }),
    parse: input.parse,
    ...(input.orderBy && { orderBy: input.orderBy }),
  })
}
