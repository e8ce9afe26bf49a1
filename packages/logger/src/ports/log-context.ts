/**
 * Well-known fields bound to a logger via `child()` or passed per call.
 */
export type LogContext = {
  requestId: string

  /** Id of the principal the request acts for. Never log credentials here. */
  principalId: string

  /** Record type the operation touches, e.g. `tasks`. */
  recordType: string
  op: string

  method: string
  path: string

  service: string
  env: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
