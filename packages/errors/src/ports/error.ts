/** Lowercase snake_case, stable across releases. Clients branch on it. */
export type ErrorCode = Lowercase<string>

/** Ids and inputs that explain the failure. Never credentials. */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** Repeating the same call could succeed, e.g. after a transient outage. */
  readonly isRetryable: boolean

  /**
   * An expected runtime condition such as a missing record or an unreachable
   * backend. `false` marks a bug or a broken invariant.
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
