import { type Application, createRouter } from "@tenantry/server"
import { createTasksModule } from "../../domains/tasks/api"
import type { AppConfig } from "../config"
import type { AppServices } from "../services"

export type ApiModule = {
  name: string
  register: (app: Application) => void
}

export function registerRoutes(app: Application, config: AppConfig, services: AppServices): void {
  const apiV1Router = createRouter()

  const modules: ApiModule[] = [createTasksModule({ tasks: services.tasks })]

  for (const m of modules) {
    m.register(apiV1Router)
  }

  app.route("/api/v1", apiV1Router)
  app.get("/", (c) => c.text(`Welcome to ${config.logging.serviceName}`))
}

export type RegisterRoutesFn = typeof registerRoutes
