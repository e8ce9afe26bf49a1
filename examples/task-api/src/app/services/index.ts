import { createTaskServices, type TaskServices } from "../../domains/tasks/composition"
import type { AppConfig } from "../config"
import { type CoreOverrides, type CoreServices, createCoreServices } from "./core"
import { createInfraClients, type InfraClients } from "./infra"

export type AppServices = {
  core: CoreServices
  infra: InfraClients
  tasks: TaskServices
}

export function createAppServices(config: AppConfig, overrides: CoreOverrides = {}): AppServices {
  const core = createCoreServices(config, overrides)
  const infra = createInfraClients(config, core)
  const tasks = createTaskServices(config, core, infra)

  return { core, infra, tasks }
}
