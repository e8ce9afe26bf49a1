import type { Logger } from "@tenantry/logger"
import type { ErrorHandler } from "hono"
import { matchedRoute } from "../middleware/utils/matched-route"
import { createErrorFormatter, type ErrorMappingsConfig } from "./error-formatter"

/**
 * Renders thrown errors through the mappings. Server faults log at `error`
 * with the cause; client errors log at `info`, with the cause only at `debug`.
 */
export function createErrorHandler(config: ErrorMappingsConfig, logger: Logger): ErrorHandler {
  const format = createErrorFormatter(config)

  return (err, c) => {
    const requestId = c.get("requestId") ?? "unknown"
    const body = format(err, requestId)
    const { status, code } = body.error

    const method = c.req.method
    const route = matchedRoute(c)
    const meta = { requestId, method, route, op: `${method} ${route}`, status, code }
    const log = c.get("logger") ?? logger

    if (status >= 500) {
      log.error("Request failed", { ...meta, err })
    } else {
      log.info("Request failed", meta)
      log.debug("Request failed details", { ...meta, err })
    }

    return c.json(body, status)
  }
}
