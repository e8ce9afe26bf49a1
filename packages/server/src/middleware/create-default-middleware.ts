import type { Logger } from "@tenantry/logger"
import type { MiddlewareHandler } from "hono"
import type { ResolvedServerOptions } from "../server/server-options"
import { requestIdMiddleware } from "./request-id"
import { requestLoggerMiddleware } from "./request-logger"
import { requestLoggingMiddleware } from "./request-logging"

/** Request id, then the per-request logger, then completion logging. */
export function createDefaultMiddleware(
  { requestId, requestLogging }: ResolvedServerOptions,
  logger: Logger,
): MiddlewareHandler[] {
  return [
    ...(requestId.enabled ? [requestIdMiddleware(requestId)] : []),
    requestLoggerMiddleware(logger),
    ...(requestLogging.enabled ? [requestLoggingMiddleware(requestLogging, logger)] : []),
  ]
}
