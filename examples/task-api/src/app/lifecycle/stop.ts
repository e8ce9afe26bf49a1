import type { LifecycleHook } from "@tenantry/server"
import type { AppServices } from "../services"

export function createStopHooks(services: AppServices): LifecycleHook[] {
  const hooks: LifecycleHook[] = []
  const { redisClient, pgPool } = services.infra

  if (redisClient) {
    hooks.push({
      name: "stop:redis",
      fn: async () => {
        if (!redisClient.isOpen) return

        if (redisClient.isReady) {
          await redisClient.quit()
        } else {
          redisClient.destroy()
        }
      },
    })
  }

  if (pgPool) {
    hooks.push({
      name: "stop:postgres",
      fn: async () => {
        await pgPool.end()
      },
    })
  }

  return hooks
}

export type CreateStopHooksFn = typeof createStopHooks
