import type { FilterSet, Page, PaginationInput, RecordData, RecordId, StoredRecord } from "@tenantry/records"

/**
 * Resource operations with the principal already bound, typically once per
 * request.
 */
export interface ScopedResource<R extends StoredRecord> {
  list(filters: FilterSet, pagination?: PaginationInput): Promise<Page<R>>

  /** @throws AccessError `not_found` when absent or owned by someone else */
  getById(id: RecordId): Promise<R>

  create(data: RecordData<R>): Promise<R>

  update(record: { readonly id: RecordId }, data: RecordData<R>): Promise<R>

  delete(record: { readonly id: RecordId }): Promise<void>
}
