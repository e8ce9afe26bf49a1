import type { LifecycleHook } from "@tenantry/server"
import type { AppServices } from "../services"

export function createStartHooks(services: AppServices): LifecycleHook[] {
  const hooks: LifecycleHook[] = []
  const redis = services.infra.redisClient
  const { logger } = services.core

  if (redis) {
    // Startup does not wait for the connection: until it is ready, cache
    // commands fail fast and reads go to the record store.
    hooks.push({
      name: "start:redis",
      fn: async () => {
        if (redis.isOpen) return

        void redis.connect().then(
          () => logger.info("Redis connected"),
          (err: unknown) => logger.warn("Redis connection abandoned", { err }),
        )
      },
    })
  }

  return hooks
}

export type CreateStartHooksFn = typeof createStartHooks
