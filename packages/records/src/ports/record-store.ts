import type { OwnerScope, RecordScope } from "../core/scope"
import type { FilterSet } from "./filters"
import type { Page, Pagination } from "./pagination"
import type { RecordData, RecordId, StoredRecord } from "./record"

/**
 * Persistence for one record type. Every method takes a scope first; rows
 * outside it are never read, changed or counted.
 */
export interface RecordStore<R extends StoredRecord> {
  find(scope: RecordScope, filters: FilterSet, pagination: Pagination): Promise<Page<R>>

  findById(scope: RecordScope, id: RecordId): Promise<R | null>

  /** Assigns `id` and the owner field. Only an owner scope can create. */
  insert(scope: OwnerScope, data: RecordData<R>): Promise<R>

  /** Never changes `id` or the owner field. `null` when not visible. */
  update(scope: RecordScope, id: RecordId, patch: RecordData<R>): Promise<R | null>

  delete(scope: RecordScope, id: RecordId): Promise<boolean>
}
