import type { Application } from "../server/server"
import type { ReadinessCheck, ResolvedHealthConfig } from "../server/server-options"

const NO_STORE = { "Cache-Control": "no-store, no-cache, must-revalidate" } as const

/**
 * Liveness always answers 200. Readiness answers 503 with the first failing
 * reason until the server is running and every check passes.
 */
export function registerHealthRoutes(
  app: Application,
  config: ResolvedHealthConfig,
  isReady: () => boolean,
): void {
  if (!config.enabled) return

  app.get(config.livenessPath, (c) => c.json({ ok: true }, 200, NO_STORE))

  app.get(config.readinessPath, async (c) => {
    const reason = isReady() ? await firstFailure(config) : "starting"

    return reason === undefined
      ? c.json({ ok: true }, 200, NO_STORE)
      : c.json({ ok: false, reason }, 503, NO_STORE)
  })
}

async function firstFailure(
  config: Extract<ResolvedHealthConfig, { enabled: true }>,
): Promise<string | undefined> {
  for (const check of config.readinessChecks) {
    const reason = await probe(check, AbortSignal.timeout(check.timeoutMs ?? config.checkTimeoutMs))
    if (reason !== undefined) return reason
  }

  return undefined
}

/** `undefined` when the check passed, otherwise the reason it did not. */
async function probe(check: ReadinessCheck, signal: AbortSignal): Promise<string | undefined> {
  const outcome = await check.fn(signal).then(
    (passed) => (passed ? ("pass" as const) : ("fail" as const)),
    () => "error" as const,
  )

  if (signal.aborted) return `${check.name}:timeout`
  if (outcome === "error") return `${check.name}:error`

  return outcome === "pass" ? undefined : check.name
}
