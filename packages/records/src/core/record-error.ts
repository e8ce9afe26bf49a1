import { BaseError } from "@tenantry/errors"

export type RecordErrorCode = "invalid_pagination" | "invalid_override" | "scope_mismatch"

export class RecordError extends BaseError<RecordErrorCode> {
  static invalidPagination(field: "page" | "pageSize", value: unknown, max?: number): RecordError {
    const expected = max === undefined ? "a positive integer" : `an integer from 1 to ${max}`

    return new RecordError(`${field} must be ${expected}`, {
      code: "invalid_pagination",
      context: { field, value, ...(max !== undefined && { max }) },
    })
  }

  static invalidOverride(recordType: string, actor: string): RecordError {
    return new RecordError(`Ownership bypass on ${recordType} needs an actor and a reason`, {
      code: "invalid_override",
      context: { recordType, actor },
    })
  }

  /** A scope issued for one record type was handed to another type's store. */
  static scopeMismatch(expected: string, actual: string): RecordError {
    return new RecordError(`Scope for ${actual} used with ${expected}`, {
      code: "scope_mismatch",
      context: { expected, actual },
      isOperational: false,
    })
  }
}
