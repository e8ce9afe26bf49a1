import type { Logger, LogLevelName } from "@tenantry/logger"
import type { Context, MiddlewareHandler } from "hono"
import type { EnabledRequestLoggingConfig, PathString } from "../server/server-options"
import { matchedRoute } from "./utils/matched-route"

/**
 * One "Request completed" line per request, at `error` for 5xx responses and
 * at the configured level otherwise. Paths under `ignorePaths` are silent.
 */
export function requestLoggingMiddleware(
  config: Required<EnabledRequestLoggingConfig>,
  baseLogger: Logger,
): MiddlewareHandler {
  const isIgnored = ignoreMatcher(config.ignorePaths)

  return async (c, next) => {
    if (isIgnored(c.req.path)) return next()

    const startedAt = performance.now()

    try {
      await next()
    } finally {
      const level: LogLevelName = c.res.status >= 500 ? "error" : config.level
      const logger = c.get("logger") ?? baseLogger

      logger[level]("Request completed", summarize(c, performance.now() - startedAt))
    }
  }
}

function summarize(c: Context, elapsedMs: number) {
  const { method, path } = c.req
  const route = matchedRoute(c)

  return {
    method,
    path,
    route,
    op: `${method} ${route}`,
    status: c.res.status,
    durationMs: Math.round(elapsedMs),
  }
}

function ignoreMatcher(paths: readonly PathString[]): (path: string) => boolean {
  const exact = new Set<string>(paths)
  const prefixes = paths.map((p) => `${p}/`)

  return (path) => exact.has(path) || prefixes.some((p) => path.startsWith(p))
}
