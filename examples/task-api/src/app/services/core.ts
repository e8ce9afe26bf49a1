import { type Clock, SystemClock } from "@tenantry/clock"
import { createPinoLogger, type Logger } from "@tenantry/logger"
import { OwnershipEnforcer } from "@tenantry/records"
import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
  clock: Clock
  enforcer: OwnershipEnforcer
}

export type CoreOverrides = {
  /** Replaces the pino logger, e.g. with a `NullLogger` in tests. */
  logger?: Logger
  clock?: Clock
}

export function createCoreServices(config: AppConfig, overrides: CoreOverrides = {}): CoreServices {
  const clock = overrides.clock ?? new SystemClock()

  const logger =
    overrides.logger ??
    createPinoLogger(
      {},
      {
        level: config.logging.level,
        prettify: config.logging.prettify,
      },
      { service: config.logging.serviceName, env: config.app.env },
    )

  return { clock, logger, enforcer: new OwnershipEnforcer({ logger }) }
}
