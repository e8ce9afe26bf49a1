import { randomUUID } from "node:crypto"
import { normalizeFilters } from "../../core/filters"
import { offsetOf, toPage } from "../../core/pagination"
import { assertScopeFor, type OwnerScope, type RecordScope } from "../../core/scope"
import type { FilterSet } from "../../ports/filters"
import type { Page, Pagination } from "../../ports/pagination"
import type { RecordData, RecordId, StoredRecord } from "../../ports/record"
import type { RecordStore } from "../../ports/record-store"
import type { RecordTypeDefinition } from "../../ports/record-type"
import { buildNewRecord, writableAttributes } from "../shared/build-record"
import type { PgQueryable } from "./pg-client"
import { escapeLike, Params, quoteIdent } from "./sql"

export type PostgresRecordStoreDeps = {
  db: PgQueryable
}

export type PostgresRecordStoreOptions = {
  /** Table holding the record type, optionally schema-qualified. */
  table: string

  /** @default crypto.randomUUID */
  generateId?: () => RecordId
}

/**
 * One table per record type. The owner predicate is always the first WHERE
 * clause; administrative scopes omit it.
 */
export class PostgresRecordStore<R extends StoredRecord> implements RecordStore<R> {
  private readonly table: string
  private readonly generateId: () => RecordId

  constructor(
    private readonly definition: RecordTypeDefinition<R>,
    private readonly deps: PostgresRecordStoreDeps,
    opts: PostgresRecordStoreOptions,
  ) {
    this.table = quoteIdent(opts.table)
    this.generateId = opts.generateId ?? (() => randomUUID())
  }

  async find(scope: RecordScope, filters: FilterSet, pagination: Pagination): Promise<Page<R>> {
    const params = new Params()
    const where = this.scopeClauses(scope, params)

    for (const [name, value] of normalizeFilters(this.definition, filters)) {
      const filter = this.definition.filters[name]
      if (!filter) continue

      const column = quoteIdent(filter.field)

      where.push(
        filter.kind === "contains"
          ? `${column} ILIKE '%' || ${params.add(escapeLike(String(value)))} || '%'`
          : `${column} = ${params.add(value)}`,
      )
    }

    const whereSql = renderWhere(where)
    const order = this.definition.orderBy
    const orderSql = order
      ? `${quoteIdent(order.field)} ${order.direction === "asc" ? "ASC" : "DESC"}, "id" ASC`
      : `"id" ASC`

    const count = await this.deps.db.query(
      `SELECT count(*)::int AS total FROM ${this.table}${whereSql}`,
      [...params.values],
    )

    const total = Number(count.rows[0]?.total ?? 0)

    const limit = params.add(pagination.pageSize)
    const offset = params.add(offsetOf(pagination))

    const res = await this.deps.db.query(
      `SELECT * FROM ${this.table}${whereSql} ORDER BY ${orderSql} LIMIT ${limit} OFFSET ${offset}`,
      params.values,
    )

    return toPage(
      res.rows.map((row) => this.definition.parse(row)),
      total,
      pagination,
    )
  }

  async findById(scope: RecordScope, id: RecordId): Promise<R | null> {
    const params = new Params()
    const where = this.scopeClauses(scope, params)

    where.push(`"id" = ${params.add(id)}`)

    const res = await this.deps.db.query(
      `SELECT * FROM ${this.table}${renderWhere(where)} LIMIT 1`,
      params.values,
    )

    return this.firstRow(res.rows)
  }

  async insert(scope: OwnerScope, data: RecordData<R>): Promise<R> {
    assertScopeFor(this.definition, scope)

    const record = buildNewRecord(this.definition, this.generateId(), scope.ownerId, data)

    const params = new Params()
    const columns: string[] = []
    const values: string[] = []

    for (const [field, value] of Object.entries(record)) {
      columns.push(quoteIdent(field))
      values.push(params.add(value))
    }

    const res = await this.deps.db.query(
      `INSERT INTO ${this.table} (${columns.join(", ")}) VALUES (${values.join(", ")}) RETURNING *`,
      params.values,
    )

    return this.firstRow(res.rows) ?? record
  }

  async update(scope: RecordScope, id: RecordId, patch: RecordData<R>): Promise<R | null> {
    const changes = Object.entries(writableAttributes(this.definition, patch))

    if (changes.length === 0) return this.findById(scope, id)

    const params = new Params()
    const where = this.scopeClauses(scope, params)

    where.push(`"id" = ${params.add(id)}`)

    const assignments = changes.map(
      ([field, value]) => `${quoteIdent(field)} = ${params.add(value)}`,
    )

    const res = await this.deps.db.query(
      `UPDATE ${this.table} SET ${assignments.join(", ")}${renderWhere(where)} RETURNING *`,
      params.values,
    )

    return this.firstRow(res.rows)
  }

  async delete(scope: RecordScope, id: RecordId): Promise<boolean> {
    const params = new Params()
    const where = this.scopeClauses(scope, params)

    where.push(`"id" = ${params.add(id)}`)

    const res = await this.deps.db.query(
      `DELETE FROM ${this.table}${renderWhere(where)} RETURNING "id"`,
      params.values,
    )

    return res.rows.length > 0
  }

  private scopeClauses(scope: RecordScope, params: Params): string[] {
    assertScopeFor(this.definition, scope)

    if (scope.kind === "administrative") return []

    return [`${quoteIdent(scope.ownerField)} = ${params.add(scope.ownerId)}`]
  }

  private firstRow(rows: Array<Record<string, unknown>>): R | null {
    const row = rows[0]

    return row ? this.definition.parse(row) : null
  }
}

function renderWhere(clauses: string[]): string {
  return clauses.length > 0 ? ` WHERE ${clauses.join(" AND ")}` : ""
}
