import { randomUUID } from "node:crypto"
import type { Clock, Milliseconds } from "@tenantry/clock"
import type { Logger, LogLevelName } from "@tenantry/logger"
import type { ErrorMappingsConfig } from "../errors/error-formatter"
import type { LifecycleHook } from "../lifecycle/lifecycle-hook"
import type { Application, Middleware } from "./server"

export type PathString = `/${string}`

export interface DisabledConfig {
  enabled: false
}

export interface ServerDependencies {
  logger: Logger
  clock: Clock
}

export interface EnabledRequestIdConfig {
  enabled: true

  /**
   * Header to read the request id from and mirror it to.
   * @default "x-request-id"
   */
  header?: string

  /** @default crypto.randomUUID() */
  generate?: () => string
}

export interface EnabledRequestLoggingConfig {
  enabled: true

  /**
   * Level for completed requests. 5xx responses always log at `error`.
   * @default "info"
   */
  level?: LogLevelName

  /**
   * @default the health paths when health routes are enabled, otherwise []
   */
  ignorePaths?: PathString[]
}

export interface ReadinessCheck {
  name: string
  timeoutMs?: Milliseconds
  fn: (signal: AbortSignal) => Promise<boolean>
}

export interface EnabledHealthConfig {
  enabled: true

  /** @default "/health" */
  livenessPath?: PathString

  /** @default "/ready" */
  readinessPath?: PathString

  /**
   * Run on every request to the readiness path.
   * @default []
   */
  readinessChecks?: ReadinessCheck[]

  /** @default 5_000 */
  checkTimeoutMs?: Milliseconds
}

export type RequestIdConfig = DisabledConfig | EnabledRequestIdConfig
export type RequestLoggingConfig = DisabledConfig | EnabledRequestLoggingConfig
export type HealthConfig = DisabledConfig | EnabledHealthConfig

export interface ServerOptions {
  port: number

  /** @default "0.0.0.0" */
  host?: string

  /**
   * Budget for all start hooks together. Startup fails once it runs out.
   *
   * @default 30_000
   */
  startupTimeoutMs?: Milliseconds

  /** @default 10_000 */
  shutdownTimeoutMs?: Milliseconds

  requestId?: RequestIdConfig
  requestLogging?: RequestLoggingConfig
  health?: HealthConfig

  errorHandling: ErrorMappingsConfig

  routes: (app: Application) => void

  middleware?: {
    /** Runs after the default middleware, before routes. */
    pre?: Middleware[]
  }

  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

export type ResolvedRequestIdConfig = DisabledConfig | Required<EnabledRequestIdConfig>

export type ResolvedRequestLoggingConfig =
  | DisabledConfig
  | Required<EnabledRequestLoggingConfig>

export type ResolvedHealthConfig = DisabledConfig | Required<EnabledHealthConfig>

export type ResolvedServerOptions = {
  port: number
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: ResolvedRequestIdConfig
  requestLogging: ResolvedRequestLoggingConfig
  health: ResolvedHealthConfig
  errorHandling: ErrorMappingsConfig
  routes: (app: Application) => void
  middleware: { pre: Middleware[] }
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

type Toggle<E extends { enabled: true }> = DisabledConfig | E | undefined

/** Disabled stays disabled; anything else is filled in by `fill`. */
function resolveToggle<E extends { enabled: true }, R>(
  given: Toggle<E>,
  fill: (partial: Partial<E>) => R,
): DisabledConfig | R {
  return given?.enabled === false ? { enabled: false } : fill(given ?? {})
}

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  const health = resolveToggle(
    options.health,
    (h): Required<EnabledHealthConfig> => ({
      enabled: true,
      livenessPath: h.livenessPath ?? "/health",
      readinessPath: h.readinessPath ?? "/ready",
      readinessChecks: h.readinessChecks ?? [],
      checkTimeoutMs: h.checkTimeoutMs ?? 5_000,
    }),
  )

  const healthPaths: PathString[] = health.enabled
    ? [health.livenessPath, health.readinessPath]
    : []

  return {
    port: options.port,
    host: options.host ?? "0.0.0.0",
    startupTimeoutMs: options.startupTimeoutMs ?? 30_000,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? 10_000,
    requestId: resolveToggle(
      options.requestId,
      (r): Required<EnabledRequestIdConfig> => ({
        enabled: true,
        header: r.header ?? "x-request-id",
        generate: r.generate ?? (() => randomUUID()),
      }),
    ),
    requestLogging: resolveToggle(
      options.requestLogging,
      (l): Required<EnabledRequestLoggingConfig> => ({
        enabled: true,
        level: l.level ?? "info",
        ignorePaths: l.ignorePaths ?? healthPaths,
      }),
    ),
    health,
    errorHandling: options.errorHandling,
    routes: options.routes,
    middleware: { pre: options.middleware?.pre ?? [] },
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}
