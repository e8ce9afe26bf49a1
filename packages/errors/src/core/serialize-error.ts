import type { SerializedError } from "../ports/error"
import { isAppError } from "./is-app-error"

export type SerializeOptions = Readonly<{
  /** @default false */
  includeStack?: boolean
}>

/**
 * JSON-safe form of any thrown value, recursing through `cause`. Anything
 * that is not an {@link AppError} gets the code `unknown` and counts as a
 * programmer error.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isRetryable: false,
      isOperational: false,
      timestamp: new Date().toISOString(),
    }
  }

  const known = isAppError(err) ? err : undefined

  return {
    name: err.name,
    code: known?.code ?? "unknown",
    message: err.message,
    context: { ...known?.context },
    isRetryable: known?.isRetryable ?? false,
    isOperational: known?.isOperational ?? false,
    timestamp: (known?.timestamp ?? new Date()).toISOString(),
    ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
    ...(options.includeStack && err.stack !== undefined && { stack: err.stack }),
  }
}
