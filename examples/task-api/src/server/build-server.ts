import { type Application, createServer, type LifecycleHook, type Server } from "@tenantry/server"
import { principalMiddleware } from "../app/middleware/principal"
import type { AppContext } from "../app/create-context"

export type BuiltServer = {
  app: Application
  server: Server
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

export function buildServer(ctx: AppContext): BuiltServer {
  const startHooks = ctx.createStartHooks(ctx.services)
  const stopHooks = ctx.createStopHooks(ctx.services)

  const server = createServer(
    {
      clock: ctx.services.core.clock,
      logger: ctx.services.core.logger,
    },
    {
      host: ctx.config.server.host,
      port: ctx.config.server.port,
      startupTimeoutMs: ctx.config.server.startupTimeoutMs,
      shutdownTimeoutMs: ctx.config.server.shutdownTimeoutMs,

      errorHandling: {
        mappings: {
          validation_error: { status: 400, message: "Request validation failed" },
          invalid_pagination: { status: 400, message: "Invalid pagination parameters" },
          unauthenticated_access: { status: 401, message: "Authentication required" },
          not_found: { status: 404, message: "Resource not found" },
        },
        transformContext: (error) =>
          error.code === "validation_error" || error.code === "invalid_pagination"
            ? { ...error.context }
            : undefined,
      },

      requestId: {
        enabled: true,
        header: ctx.config.requestId.header,
      },

      requestLogging: {
        enabled: true,
      },

      middleware: {
        pre: [principalMiddleware({ header: ctx.config.principal.header })],
      },

      routes: (app: Application): void => {
        ctx.registerRoutes(app, ctx.config, ctx.services)
      },

      startHooks,
      stopHooks,
    },
  )

  return {
    app: server.buildApp(),
    server,
    startHooks,
    stopHooks,
  }
}
