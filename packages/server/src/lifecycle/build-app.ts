import type { Logger } from "@tenantry/logger"
import { Hono } from "hono"
import { createErrorHandler } from "../errors/error-handler"
import { createDefaultMiddleware } from "../middleware/create-default-middleware"
import { registerHealthRoutes } from "../routes/health"
import type { Application } from "../server/server"
import type { ResolvedServerOptions } from "../server/server-options"

export interface BuildAppContext {
  options: ResolvedServerOptions
  logger: Logger
  isReady: () => boolean
}

/**
 * Assembles the application: default middleware, health routes, user
 * middleware, user routes, then the error handler.
 */
export function buildApp(ctx: BuildAppContext): Application {
  const { options, logger, isReady } = ctx

  const app: Application = new Hono()

  for (const mw of createDefaultMiddleware(options, logger)) app.use("*", mw)

  registerHealthRoutes(app, options.health, isReady)

  for (const mw of options.middleware.pre) app.use("*", mw)

  options.routes(app)

  app.onError(createErrorHandler(options.errorHandling, logger))

  return app
}

export type BuildAppFn = typeof buildApp
