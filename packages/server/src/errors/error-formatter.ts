import { type AppError, type ErrorCode, isAppError } from "@tenantry/errors"
import type { ContentfulStatusCode } from "hono/utils/http-status"

export type ErrorMapping = {
  status: ContentfulStatusCode

  /** Shown to clients verbatim. */
  message: string
}

export type FallbackMapping = ErrorMapping & {
  code: ErrorCode
}

export type ErrorContextTransformer = (
  error: AppError,
) => Record<string, unknown> | undefined

export interface ErrorMappingsConfig {
  /** Response status and message per error code. */
  mappings: Partial<Record<ErrorCode, ErrorMapping>>

  /** @default 500 internal_error */
  fallback?: FallbackMapping

  /** Context fields to expose in the body. The envelope fields always win. */
  transformContext?: ErrorContextTransformer
}

export type ErrorResponseBody = {
  status: ContentfulStatusCode
  code: ErrorCode
  message: string
  requestId: string
  [key: string]: unknown
}

export type ErrorResponse = {
  error: ErrorResponseBody
}

export type ErrorFormatter = (error: unknown, requestId: string) => ErrorResponse

const DEFAULT_FALLBACK: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "An unexpected error occurred",
}

/**
 * An `AppError` with a mapping gets that status and message. Without one it
 * keeps its code and takes the fallback status and message. Anything else is
 * the fallback throughout.
 */
export function createErrorFormatter({
  mappings,
  fallback = DEFAULT_FALLBACK,
  transformContext,
}: ErrorMappingsConfig): ErrorFormatter {
  return (error, requestId) => {
    const known = isAppError(error) ? error : undefined
    const { status, message } = (known && mappings[known.code]) ?? fallback

    return {
      error: {
        ...(known && transformContext?.(known)),
        code: known?.code ?? fallback.code,
        status,
        message,
        requestId,
      },
    }
  }
}
