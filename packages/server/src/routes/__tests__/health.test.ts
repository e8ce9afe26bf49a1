import { Hono } from "hono"
import type { ReadinessCheck, ResolvedHealthConfig } from "../../server/server-options"
import { registerHealthRoutes } from "../health"

describe("registerHealthRoutes", () => {
  function appWith(readinessChecks: ReadinessCheck[], ready = true) {
    const app = new Hono()

    const config: ResolvedHealthConfig = {
      enabled: true,
      livenessPath: "/health",
      readinessPath: "/ready",
      readinessChecks,
      checkTimeoutMs: 1_000,
    }

    registerHealthRoutes(app, config, () => ready)

    return app
  }

  it("answers liveness without caching", async () => {
    const res = await appWith([]).request("/health")

    expect(res.status).toBe(200)
    expect(await res.json()).toStrictEqual({ ok: true })
    expect(res.headers.get("cache-control")).toBe("no-store, no-cache, must-revalidate")
  })

  it("reports starting until ready", async () => {
    const res = await appWith([], false).request("/ready")

    expect(res.status).toBe(503)
    expect(await res.json()).toStrictEqual({ ok: false, reason: "starting" })
  })

  it("runs readiness checks in order", async () => {
    const cache = vi.fn(async () => true)
    const db = vi.fn(async () => false)

    const res = await appWith([
      { name: "cache", fn: cache },
      { name: "db", fn: db },
    ]).request("/ready")

    expect(res.status).toBe(503)
    expect(await res.json()).toStrictEqual({ ok: false, reason: "db" })
    expect(cache).toHaveBeenCalledOnce()
  })

  it("names a check that throws", async () => {
    const res = await appWith([
      {
        name: "db",
        fn: async () => {
          throw new Error("ECONNREFUSED")
        },
      },
    ]).request("/ready")

    expect(await res.json()).toStrictEqual({ ok: false, reason: "db:error" })
  })

  it("registers nothing when disabled", async () => {
    const app = new Hono()

    registerHealthRoutes(app, { enabled: false }, () => true)

    expect((await app.request("/health")).status).toBe(404)
  })
})
