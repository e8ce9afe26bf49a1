import { serve } from "@hono/node-server"
import type { Logger } from "@tenantry/logger"
import type { Application } from "../server/server"
import type { ResolvedServerOptions } from "../server/server-options"
import type { Closeable } from "./shutdown"

/** Binds the app to a Node HTTP server and returns the listener. */
export function listen(
  app: Application,
  { host, port }: ResolvedServerOptions,
  logger: Logger,
): Closeable {
  const listener = serve({ fetch: app.fetch, hostname: host, port })

  logger.info(`Server listening on http://${host}:${port}`, { host, port })

  return listener
}

export type ListenFn = typeof listen
