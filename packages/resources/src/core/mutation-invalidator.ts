import { type BytesCache, type CacheTag, CacheError } from "@tenantry/cache"
import type { Logger } from "@tenantry/logger"
import type { RecordId } from "@tenantry/records"
import { deriveTags } from "./derive-keys"

export type Mutation = "create" | "update" | "delete"

export type MutationInvalidatorDeps = {
  cache: Pick<BytesCache, "invalidateTags">
  logger: Logger
}

/**
 * Drops cached reads a write has made stale. Call after the store write
 * resolved. Backend failures are logged and swallowed: the write already
 * happened and must still succeed.
 */
export class MutationInvalidator {
  constructor(
    private readonly recordType: string,
    private readonly deps: MutationInvalidatorDeps,
  ) {}

  async afterCreate(record: { readonly id: RecordId }): Promise<void> {
    const { collectionTag } = deriveTags(this.recordType, record)

    await this.invalidate("create", record.id, [collectionTag])
  }

  async afterUpdate(record: { readonly id: RecordId }): Promise<void> {
    const { collectionTag, itemTag } = deriveTags(this.recordType, record)

    await this.invalidate("update", record.id, [itemTag, collectionTag])
  }

  async afterDelete(record: { readonly id: RecordId }): Promise<void> {
    const { collectionTag, itemTag } = deriveTags(this.recordType, record)

    await this.invalidate("delete", record.id, [itemTag, collectionTag])
  }

  private async invalidate(
    mutation: Mutation,
    recordId: RecordId,
    tags: readonly CacheTag[],
  ): Promise<void> {
    try {
      await this.deps.cache.invalidateTags(tags)
    } catch (err) {
      this.deps.logger.error("Cache invalidation failed", {
        recordType: this.recordType,
        err: CacheError.invalidationFailure(
          tags,
          { recordType: this.recordType, recordId, mutation },
          err,
        ),
      })
    }
  }
}
