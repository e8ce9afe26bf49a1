import type { Logger } from "@tenantry/logger"
import type { MiddlewareHandler } from "hono"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/** Binds a per-request child logger carrying the request id. */
export function requestLoggerMiddleware(baseLogger: Logger): MiddlewareHandler {
  return async (c, next) => {
    const requestId = c.get("requestId")

    c.set("logger", baseLogger.child(isNonEmptyString(requestId) ? { requestId } : {}))

    await next()
  }
}
