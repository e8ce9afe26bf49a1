import type { Milliseconds, Seconds } from "@tenantry/clock"
import { type LogLevelName, logLevelNames } from "@tenantry/logger"
import { z } from "zod/mini"

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "Task API"),
  SERVER_HOST: z._default(z.string(), "0.0.0.0"),
  SERVER_PORT: z._default(z.coerce.number(), 4664),
  SERVER_STARTUP_TIMEOUT_MS: z._default(z.coerce.number(), 30_000),
  SERVER_SHUTDOWN_TIMEOUT_MS: z._default(z.coerce.number(), 10_000),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  REQUEST_ID_HEADER: z._default(z.string(), "x-request-id"),
  PRINCIPAL_HEADER: z._default(z.string(), "x-principal-id"),

  CACHE_DRIVER: z._default(z.enum(["memory", "redis"]), "memory"),
  CACHE_TTL_SECONDS: z._default(z.coerce.number(), 3600),
  CACHE_MAX_ENTRIES: z._default(z.coerce.number(), 10_000),

  REDIS_URL: z._default(z.string(), "redis://localhost:6379"),
  REDIS_KEY_PREFIX: z._default(z.string(), "app:task-api:cache:"),
  REDIS_CONNECT_TIMEOUT_MS: z._default(z.coerce.number(), 2000),
  REDIS_COMMAND_TIMEOUT_MS: z._default(z.coerce.number(), 1000),

  RECORD_STORE: z._default(z.enum(["memory", "postgres"]), "memory"),
  DATABASE_URL: z.optional(z.string()),
  TASKS_TABLE: z._default(z.string(), "tasks"),
  TASKS_DEFAULT_PAGE_SIZE: z._default(z.coerce.number(), 15),
  TASKS_MAX_PAGE_SIZE: z._default(z.coerce.number(), 100),
})

export type EnvConfig = z.infer<typeof envSchema>

export type CacheConfig =
  | { driver: "memory"; ttlSeconds: Seconds; maxEntries: number }
  | {
      driver: "redis"
      ttlSeconds: Seconds
      url: string
      keyPrefix: string
      connectTimeoutMs: Milliseconds
      commandTimeoutMs: Milliseconds
    }

export type RecordStoreConfig = { driver: "memory" } | { driver: "postgres"; databaseUrl: string }

export type AppConfig = {
  app: {
    env: string
  }

  server: {
    host: string
    port: number
    startupTimeoutMs: Milliseconds
    shutdownTimeoutMs: Milliseconds
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  requestId: {
    header: string
  }

  principal: {
    header: string
  }

  cache: CacheConfig
  store: RecordStoreConfig

  tasks: {
    table: string
    defaultPageSize: number
    maxPageSize: number
  }
}
