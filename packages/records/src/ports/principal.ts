export type PrincipalId = string

/**
 * The authenticated actor a request runs for. Issued upstream; only `id` is
 * read here.
 */
export type Principal = {
  readonly id: PrincipalId
}
