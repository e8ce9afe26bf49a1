import { FakeClock } from "@tenantry/clock"
import { NullLogger } from "@tenantry/logger"
import type { Application } from "@tenantry/server"
import { type AppContext, type AppContextOptions, createAppContext } from "../app/create-context"
import { buildServer } from "../server"

export type TestHarness = {
  /** Fully built Hono app, ready for app.request() */
  app: Application

  ctx: AppContext

  clock: FakeClock
}

/**
 * In-memory cache and store, no `.env` file and no process environment.
 */
export async function createTestHarness(options: AppContextOptions = {}): Promise<TestHarness> {
  const clock = new FakeClock(0)

  const ctx = await createAppContext({
    env: { NODE_ENV: "test" },
    coreOverrides: { logger: new NullLogger(), clock },
    ...options,
  })

  const { app } = buildServer(ctx)

  return { app, ctx, clock }
}
