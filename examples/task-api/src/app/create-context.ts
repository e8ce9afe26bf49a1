import { fileURLToPath } from "node:url"
import { type AppConfig, loadEnvConfig, mapEnvToConfig, misspelledKeys } from "./config"
import { type CreateStartHooksFn, type CreateStopHooksFn, createStartHooks, createStopHooks } from "./lifecycle"
import { type RegisterRoutesFn, registerRoutes } from "./routes/register-routes"
import { type AppServices, createAppServices } from "./services"
import type { CoreOverrides } from "./services/core"

export type AppContextOptions = {
  env?: Record<string, string | undefined>

  /** Raw settings applied after the environment, e.g. `{ CACHE_DRIVER: "memory" }`. */
  configOverrides?: Record<string, unknown>

  coreOverrides?: CoreOverrides
}

export type AppContext = {
  config: AppConfig
  services: AppServices
  registerRoutes: RegisterRoutesFn
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

const projectRoot = fileURLToPath(new URL("../..", import.meta.url))

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const loaded = await loadEnvConfig({
    env: options.env ?? process.env,
    cwd: projectRoot,
    ...(options.configOverrides && { overrides: options.configOverrides }),
  })

  const config = mapEnvToConfig(loaded.value)
  const services = createAppServices(config, options.coreOverrides)
  const { logger } = services.core

  logger.info("Configuration loaded", {
    sources: loaded.sourcesUsed(),
    origins: {
      CACHE_DRIVER: loaded.explain("CACHE_DRIVER"),
      RECORD_STORE: loaded.explain("RECORD_STORE"),
    },
  })

  const unknown = misspelledKeys(loaded)

  if (unknown.length > 0) {
    logger.warn("Ignoring unknown configuration keys", { keys: unknown })
  }

  return {
    config,
    services,
    registerRoutes,
    createStartHooks,
    createStopHooks,
  }
}
