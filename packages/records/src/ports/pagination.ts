export type Pagination = {
  /** 1-based. */
  page: number
  pageSize: number
}

export type PaginationInput = {
  page?: number | undefined
  pageSize?: number | undefined
}

export type PaginationLimits = {
  /** @default 15 */
  defaultPageSize: number

  /** @default 100 */
  maxPageSize: number
}

export type Page<R> = {
  items: R[]
  page: number
  pageSize: number
  total: number

  /** Never below 1, even when `total` is 0. */
  lastPage: number
}
