import {
  type ConfigSource,
  ConfigError,
  DotenvSource,
  EnvSource,
  type IConfig,
  loadConfig,
  ObjectSource,
} from "@tenantry/config"
import type { AppConfig, CacheConfig, EnvConfig, RecordStoreConfig } from "./schema"
import { envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT,
      startupTimeoutMs: env.SERVER_STARTUP_TIMEOUT_MS,
      shutdownTimeoutMs: env.SERVER_SHUTDOWN_TIMEOUT_MS,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    requestId: {
      header: env.REQUEST_ID_HEADER,
    },
    principal: {
      header: env.PRINCIPAL_HEADER,
    },
    cache: mapCacheConfig(env),
    store: mapStoreConfig(env),
    tasks: {
      table: env.TASKS_TABLE,
      defaultPageSize: env.TASKS_DEFAULT_PAGE_SIZE,
      maxPageSize: env.TASKS_MAX_PAGE_SIZE,
    },
  }
}

function mapCacheConfig(env: EnvConfig): CacheConfig {
  if (env.CACHE_DRIVER === "redis") {
    return {
      driver: "redis",
      ttlSeconds: env.CACHE_TTL_SECONDS,
      url: env.REDIS_URL,
      keyPrefix: env.REDIS_KEY_PREFIX,
      connectTimeoutMs: env.REDIS_CONNECT_TIMEOUT_MS,
      commandTimeoutMs: env.REDIS_COMMAND_TIMEOUT_MS,
    }
  }

  return { driver: "memory", ttlSeconds: env.CACHE_TTL_SECONDS, maxEntries: env.CACHE_MAX_ENTRIES }
}

function mapStoreConfig(env: EnvConfig): RecordStoreConfig {
  if (env.RECORD_STORE === "memory") return { driver: "memory" }

  if (!env.DATABASE_URL) {
    throw ConfigError.invalid("DATABASE_URL is required when RECORD_STORE=postgres", [
      "DATABASE_URL",
    ])
  }

  return { driver: "postgres", databaseUrl: env.DATABASE_URL }
}

export type LoadAppConfigOptions = {
  env: Record<string, string | undefined>

  /** Directory holding the `.env.<NODE_ENV>` file. */
  cwd: string

  /** Raw settings applied last, e.g. `{ CACHE_TTL_SECONDS: "5" }` in tests. */
  overrides?: Record<string, unknown>
}

/** Raw settings with the source of each one. */
export async function loadEnvConfig(opts: LoadAppConfigOptions): Promise<IConfig<EnvConfig>> {
  const nodeEnv = opts.env.NODE_ENV ?? "development"

  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${nodeEnv}`, required: false, cwd: opts.cwd }),
    new EnvSource({ env: opts.env }),
    ...(opts.overrides ? [new ObjectSource(opts.overrides)] : []),
  ]

  return loadConfig({ schema: envSchema, sources })
}

/**
 * Provided keys the schema ignores that share a first segment with one it
 * reads, such as `REDIS_URI` next to `REDIS_URL`. The rest of the process
 * environment is not reported.
 */
export function misspelledKeys(config: IConfig<EnvConfig>): string[] {
  const segments = new Set(Object.keys(config.value).map(firstSegment))

  return config.unknownKeys().filter((key) => segments.has(firstSegment(key)))
}

function firstSegment(key: string): string {
  return key.split("_", 1)[0] ?? key
}
