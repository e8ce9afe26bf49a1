export {
  type LoadAppConfigOptions,
  loadEnvConfig,
  mapEnvToConfig,
  misspelledKeys,
} from "./load-app-config"
export type { AppConfig, CacheConfig, EnvConfig, RecordStoreConfig } from "./schema"
