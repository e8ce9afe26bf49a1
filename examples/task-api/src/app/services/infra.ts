import {
  type BytesCache,
  createRedisBytesClient,
  MemoryBytesCache,
  type RedisBytesClient,
  RedisBytesCache,
} from "@tenantry/cache"
import { createPgPool } from "@tenantry/records"
import type { Pool } from "pg"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type InfraClients = {
  cache: BytesCache

  /** Present when the cache driver is `redis`. */
  redisClient?: RedisBytesClient

  /** Present when the record store is `postgres`. */
  pgPool?: Pool
}

export function createInfraClients(config: AppConfig, core: CoreServices): InfraClients {
  const pgPool =
    config.store.driver === "postgres"
      ? createPgPool({ connectionString: config.store.databaseUrl })
      : undefined

  if (config.cache.driver === "memory") {
    const cache = new MemoryBytesCache(
      { clock: core.clock },
      { maxEntries: config.cache.maxEntries },
    )

    return { cache, ...(pgPool && { pgPool }) }
  }

  const redisClient = createRedisBytesClient({
    url: config.cache.url,
    connectTimeoutMs: config.cache.connectTimeoutMs,
  })

  redisClient.on("error", (err) => {
    core.logger.warn("Redis client error", { err })
  })

  const cache = new RedisBytesCache(
    { client: redisClient, clock: core.clock },
    { keyspacePrefix: config.cache.keyPrefix, commandTimeoutMs: config.cache.commandTimeoutMs },
  )

  return { cache, redisClient, ...(pgPool && { pgPool }) }
}
