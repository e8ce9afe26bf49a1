import { BaseError } from "@tenantry/errors"
import type { RecordId } from "../ports/record"

export type AccessErrorCode = "unauthenticated_access" | "not_found"

export class AccessError extends BaseError<AccessErrorCode> {
  static unauthenticated(recordType: string): AccessError {
    return new AccessError(`No principal bound for ${recordType} access`, {
      code: "unauthenticated_access",
      context: { recordType },
    })
  }

  /**
   * Absent and owned-by-someone-else look the same from outside.
   */
  static notFound(recordType: string, id: RecordId): AccessError {
    return new AccessError(`${recordType} ${id} not found`, {
      code: "not_found",
      context: { recordType, id },
    })
  }
}
