import type { AppError } from "../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

function isErrorCode(v: unknown): v is AppError["code"] {
  return typeof v === "string" && v.length > 0 && v === v.toLowerCase()
}

/**
 * Duck-typed guard for {@link AppError}, so errors raised by a second copy of
 * this package (or hand-built errors) are still recognised.
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  return (
    isErrorCode(e.code) &&
    isRecord(e.context) &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
