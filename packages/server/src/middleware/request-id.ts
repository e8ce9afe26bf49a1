import type { MiddlewareHandler } from "hono"
import type { EnabledRequestIdConfig } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"
import { setHeaderIfMissing } from "./utils/set-header-if-missing"

/**
 * Takes the request id from the configured header, or generates one, then
 * attaches it to the context and mirrors it onto the response.
 */
export function requestIdMiddleware(
  config: Required<EnabledRequestIdConfig>,
): MiddlewareHandler {
  return async (c, next) => {
    const fromHeader = c.req.header(config.header)
    const requestId = isNonEmptyString(fromHeader) ? fromHeader : config.generate()

    c.set("requestId", requestId)

    await next()

    setHeaderIfMissing(c.res.headers, config.header, requestId)
  }
}
