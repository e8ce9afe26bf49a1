export { MemoryRecordStore, type MemoryRecordStoreOptions } from "./adapters/memory/memory-record-store"
export { createPgPool, type PgQueryable } from "./adapters/postgres/pg-client"
export {
  PostgresRecordStore,
  type PostgresRecordStoreDeps,
  type PostgresRecordStoreOptions,
} from "./adapters/postgres/postgres-record-store"
export { AccessError, type AccessErrorCode } from "./core/access-error"
export { defineRecordType } from "./core/define-record-type"
export { matchesFilter, normalizeFilters } from "./core/filters"
export {
  OwnershipEnforcer,
  type OwnershipEnforcerDeps,
  type OverrideRequest,
} from "./core/ownership-enforcer"
export { DEFAULT_PAGINATION_LIMITS, resolvePagination, toPage } from "./core/pagination"
export { RecordError, type RecordErrorCode } from "./core/record-error"
export { AdministrativeScope, OwnerScope, type RecordScope } from "./core/scope"
export type {
  FilterKind,
  FilterSet,
  FilterValue,
  NormalizedFilters,
} from "./ports/filters"
export type { Page, Pagination, PaginationInput, PaginationLimits } from "./ports/pagination"
export type { Principal, PrincipalId } from "./ports/principal"
export type { RecordData, RecordId, StoredRecord } from "./ports/record"
export type { RecordStore } from "./ports/record-store"
export type {
  FieldName,
  FilterDefinition,
  OrderBy,
  RecordTypeDefinition,
  RecordTypeInput,
} from "./ports/record-type"
