import { createHash } from "node:crypto"
import type { CacheKey, CacheTag } from "@tenantry/cache"
import type { FilterSet, Pagination, PrincipalId, RecordId } from "@tenantry/records"

export type RecordTags = {
  collectionTag: CacheTag
  itemTag: CacheTag
}

/**
 * Key for one page of a principal's list. Filter order does not matter;
 * `undefined` filters are left out.
 *
 * @example
 * ```ts
 * deriveListKey("tasks", { status: "done" }, { page: 1, pageSize: 15 }, "7")
 * // "tasks:list:<64 hex chars>"
 * ```
 */
export function deriveListKey(
  recordType: string,
  filters: FilterSet,
  pagination: Pagination,
  principalId: PrincipalId,
): CacheKey {
  const sorted = Object.entries(filters)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))

  const canonical = JSON.stringify({
    filters: sorted,
    page: pagination.page,
    pageSize: pagination.pageSize,
    principalId,
  })

  const hash = createHash("sha256").update(canonical).digest("hex")

  return `${recordType}:list:${hash}`
}

/** Not tenant-qualified: visibility is checked on every hit. */
export function deriveItemKey(recordType: string, id: RecordId): CacheKey {
  return `${recordType}:item:${id}`
}

export function deriveTags(recordType: string, record: { readonly id: RecordId }): RecordTags {
  return {
    collectionTag: recordType,
    itemTag: `${recordType}:${record.id}`,
  }
}
