import { BaseError } from "@tenantry/errors"
import type { CacheKey } from "../ports/cache-key"
import type { CacheTag } from "../ports/cache-tag"

export type CacheErrorCode =
  | "cache_unavailable"
  | "cache_timeout"
  | "cache_invalidation_failure"
  | "untagged_entry"

export type CacheOp = "get" | "set" | "generations"

export class CacheError extends BaseError<CacheErrorCode> {
  /** The backend could not be read or written. Callers fall back to the source. */
  static unavailable(op: CacheOp, key: CacheKey, cause: unknown): CacheError {
    return new CacheError(`Cache ${op} failed for ${key}`, {
      code: "cache_unavailable",
      context: { op, key },
      cause,
      isRetryable: true,
    })
  }

  static timedOut(command: string, timeoutMs: number): CacheError {
    return new CacheError(`Cache command ${command} timed out after ${timeoutMs}ms`, {
      code: "cache_timeout",
      context: { command, timeoutMs },
      isRetryable: true,
    })
  }

  static invalidationFailure(
    tags: readonly CacheTag[],
    context: Record<string, unknown>,
    cause: unknown,
  ): CacheError {
    return new CacheError(`Failed to invalidate tags ${tags.join(", ")}`, {
      code: "cache_invalidation_failure",
      context: { ...context, tags },
      cause,
      isRetryable: true,
    })
  }

  static untaggedEntry(key: CacheKey): CacheError {
    return new CacheError(`Refusing to cache ${key} without tags`, {
      code: "untagged_entry",
      context: { key },
      isOperational: false,
    })
  }
}

export function assertTagged(key: CacheKey, tags: readonly CacheTag[]): void {
  if (tags.length === 0 || tags.some((tag) => tag.length === 0)) {
    throw CacheError.untaggedEntry(key)
  }
}
