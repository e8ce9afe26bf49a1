import { randomUUID } from "node:crypto"
import { matchesFilter, normalizeFilters } from "../../core/filters"
import { offsetOf, toPage } from "../../core/pagination"
import { assertScopeFor, type OwnerScope, type RecordScope } from "../../core/scope"
import type { FilterSet } from "../../ports/filters"
import type { Page, Pagination } from "../../ports/pagination"
import type { RecordData, RecordId, StoredRecord } from "../../ports/record"
import type { RecordStore } from "../../ports/record-store"
import type { OrderBy, RecordTypeDefinition } from "../../ports/record-type"
import { buildNewRecord, writableAttributes } from "../shared/build-record"

export type MemoryRecordStoreOptions = {
  /** @default crypto.randomUUID */
  generateId?: () => RecordId
}

/**
 * In-process store. Rows are copied in and out, so callers never hold a
 * reference into the store.
 */
export class MemoryRecordStore<R extends StoredRecord> implements RecordStore<R> {
  private readonly rows = new Map<RecordId, R>()
  private readonly generateId: () => RecordId

  constructor(
    private readonly definition: RecordTypeDefinition<R>,
    opts: MemoryRecordStoreOptions = {},
  ) {
    this.generateId = opts.generateId ?? (() => randomUUID())
  }

  async find(scope: RecordScope, filters: FilterSet, pagination: Pagination): Promise<Page<R>> {
    assertScopeFor(this.definition, scope)

    const active = normalizeFilters(this.definition, filters)

    const matching = [...this.rows.values()].filter(
      (row) =>
        scope.includes(row) &&
        active.every(([name, value]) => {
          const filter = this.definition.filters[name]
          return filter !== undefined && matchesFilter(row, filter, value)
        }),
    )

    if (this.definition.orderBy) sortRows(matching, this.definition.orderBy)

    const offset = offsetOf(pagination)
    const items = matching.slice(offset, offset + pagination.pageSize).map(copy)

    return toPage(items, matching.length, pagination)
  }

  async findById(scope: RecordScope, id: RecordId): Promise<R | null> {
    const row = this.visible(scope, id)

    return row ? copy(row) : null
  }

  async insert(scope: OwnerScope, data: RecordData<R>): Promise<R> {
    assertScopeFor(this.definition, scope)

    let id = this.generateId()
    while (this.rows.has(id)) id = this.generateId()

    const record = buildNewRecord(this.definition, id, scope.ownerId, data)

    this.rows.set(id, record)

    return copy(record)
  }

  async update(scope: RecordScope, id: RecordId, patch: RecordData<R>): Promise<R | null> {
    const row = this.visible(scope, id)

    if (!row) return null

    const updated = this.definition.parse({
      ...row,
      ...writableAttributes(this.definition, patch),
    })

    this.rows.set(id, updated)

    return copy(updated)
  }

  async delete(scope: RecordScope, id: RecordId): Promise<boolean> {
    if (!this.visible(scope, id)) return false

    return this.rows.delete(id)
  }

  /** Number of rows across all owners. */
  size(): number {
    return this.rows.size
  }

  private visible(scope: RecordScope, id: RecordId): R | undefined {
    assertScopeFor(this.definition, scope)

    const row = this.rows.get(id)

    return row && scope.includes(row) ? row : undefined
  }
}

function copy<R>(row: R): R {
  return structuredClone(row)
}

function sortRows<R extends StoredRecord>(rows: R[], orderBy: OrderBy<R>): void {
  const sign = orderBy.direction === "asc" ? 1 : -1

  rows.sort((a, b) => sign * compareValues(a[orderBy.field], b[orderBy.field]))
}

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return a - b
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime()

  const left = String(a ?? "")
  const right = String(b ?? "")

  return left < right ? -1 : left > right ? 1 : 0
}
