import type { Page, Pagination, PaginationInput, PaginationLimits } from "../ports/pagination"
import { RecordError } from "./record-error"

export const DEFAULT_PAGINATION_LIMITS: PaginationLimits = {
  defaultPageSize: 15,
  maxPageSize: 100,
}

/**
 * Fills in defaults and validates.
 *
 * @throws RecordError `invalid_pagination`
 */
export function resolvePagination(
  input: PaginationInput = {},
  limits: PaginationLimits = DEFAULT_PAGINATION_LIMITS,
): Pagination {
  const page = input.page ?? 1
  const pageSize = input.pageSize ?? limits.defaultPageSize

  if (!Number.isInteger(page) || page < 1) {
    throw RecordError.invalidPagination("page", page)
  }

  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > limits.maxPageSize) {
    throw RecordError.invalidPagination("pageSize", pageSize, limits.maxPageSize)
  }

  return { page, pageSize }
}

export function offsetOf(pagination: Pagination): number {
  return (pagination.page - 1) * pagination.pageSize
}

export function toPage<R>(items: R[], total: number, pagination: Pagination): Page<R> {
  return {
    items,
    page: pagination.page,
    pageSize: pagination.pageSize,
    total,
    lastPage: Math.max(1, Math.ceil(total / pagination.pageSize)),
  }
}
