import {
  type BytesCache,
  type CacheSetOptions,
  type CacheTag,
  CodecDataCache,
  createJsonCodec,
  ReadThroughCache,
} from "@tenantry/cache"
import type { Seconds } from "@tenantry/clock"
import type { Logger } from "@tenantry/logger"
import {
  AccessError,
  DEFAULT_PAGINATION_LIMITS,
  type FilterSet,
  normalizeFilters,
  type OwnershipEnforcer,
  type Page,
  type PaginationInput,
  type PaginationLimits,
  type Principal,
  type RecordData,
  type RecordId,
  type RecordStore,
  type RecordTypeDefinition,
  resolvePagination,
  type StoredRecord,
} from "@tenantry/records"
import type { ScopedResource } from "../ports/scoped-resource"
import { deriveItemKey, deriveListKey, deriveTags } from "./derive-keys"
import { MutationInvalidator } from "./mutation-invalidator"

const DEFAULT_TTL_SECONDS: Seconds = 3600

export type CachedResourceServiceDeps<R extends StoredRecord> = {
  store: RecordStore<R>
  cache: BytesCache
  enforcer: OwnershipEnforcer
  logger: Logger
}

export type CachedResourceServiceOptions = {
  /** @default 3600 */
  ttlSeconds?: Seconds

  /** @default DEFAULT_PAGINATION_LIMITS */
  pagination?: PaginationLimits
}

/**
 * Owner-scoped reads and writes for one record type, with list pages and
 * single records cached under tags that writes invalidate.
 *
 * Item keys are shared across principals, so every cached record is checked
 * against the caller's scope before it is returned.
 */
export class CachedResourceService<R extends StoredRecord> {
  private readonly pages: ReadThroughCache<Page<R>>
  private readonly items: ReadThroughCache<R>
  private readonly invalidator: MutationInvalidator
  private readonly ttlSeconds: Seconds
  private readonly limits: PaginationLimits

  constructor(
    private readonly definition: RecordTypeDefinition<R>,
    private readonly deps: CachedResourceServiceDeps<R>,
    opts: CachedResourceServiceOptions = {},
  ) {
    const logger = deps.logger.child({ recordType: definition.name })

    this.pages = new ReadThroughCache({
      cache: new CodecDataCache(deps.cache, createJsonCodec<Page<R>>()),
      logger,
    })
    this.items = new ReadThroughCache({
      cache: new CodecDataCache(deps.cache, createJsonCodec<R>()),
      logger,
    })
    this.invalidator = new MutationInvalidator(definition.name, { cache: deps.cache, logger })
    this.ttlSeconds = opts.ttlSeconds ?? DEFAULT_TTL_SECONDS
    this.limits = opts.pagination ?? DEFAULT_PAGINATION_LIMITS
  }

  async list(
    filters: FilterSet,
    pagination: PaginationInput | undefined,
    principal: Principal | undefined,
  ): Promise<Page<R>> {
    const scope = this.deps.enforcer.scopeFor(this.definition, principal)
    const resolved = resolvePagination(pagination, this.limits)
    const normalized = Object.fromEntries(normalizeFilters(this.definition, filters))

    const key = deriveListKey(this.definition.name, normalized, resolved, scope.ownerId)

    return this.pages.getOrCompute(key, this.cacheOptions([this.definition.name]), () =>
      this.deps.store.find(scope, normalized, resolved),
    )
  }

  async getById(id: RecordId, principal: Principal | undefined): Promise<R> {
    const scope = this.deps.enforcer.scopeFor(this.definition, principal)
    const { collectionTag, itemTag } = deriveTags(this.definition.name, { id })

    const record = await this.items.getOrCompute(
      deriveItemKey(this.definition.name, id),
      this.cacheOptions([collectionTag, itemTag]),
      async () => {
        const found = await this.deps.store.findById(scope, id)
        if (!found) throw AccessError.notFound(this.definition.name, id)
        return found
      },
    )

    this.deps.enforcer.assertVisible(this.definition, record, scope)

    return record
  }

  async create(data: RecordData<R>, principal: Principal | undefined): Promise<R> {
    const scope = this.deps.enforcer.scopeFor(this.definition, principal)
    const record = await this.deps.store.insert(scope, data)

    await this.invalidator.afterCreate(record)

    return record
  }

  /**
   * @throws AccessError `not_found` when the row is gone or not visible
   */
  async update(
    record: { readonly id: RecordId },
    data: RecordData<R>,
    principal: Principal | undefined,
  ): Promise<R> {
    const scope = this.deps.enforcer.scopeFor(this.definition, principal)
    const updated = await this.deps.store.update(scope, record.id, data)

    if (!updated) throw AccessError.notFound(this.definition.name, record.id)

    await this.invalidator.afterUpdate(updated)

    return updated
  }

  async delete(record: { readonly id: RecordId }, principal: Principal | undefined): Promise<void> {
    const scope = this.deps.enforcer.scopeFor(this.definition, principal)
    const deleted = await this.deps.store.delete(scope, record.id)

    if (!deleted) throw AccessError.notFound(this.definition.name, record.id)

    await this.invalidator.afterDelete(record)
  }

  forPrincipal(principal: Principal | undefined): ScopedResource<R> {
    return {
      list: (filters, pagination) => this.list(filters, pagination, principal),
      getById: (id) => this.getById(id, principal),
      create: (data) => this.create(data, principal),
      update: (record, data) => this.update(record, data, principal),
      delete: (record) => this.delete(record, principal),
    }
  }

  private cacheOptions(tags: readonly CacheTag[]): CacheSetOptions {
    return { ttl: { kind: "seconds", seconds: this.ttlSeconds }, tags }
  }
}
