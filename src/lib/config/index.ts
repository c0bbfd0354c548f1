export {
  loadConfig,
  parseConfig,
  clearConfigCache,
  resolveConfigPath,
  defaultConfigPath,
  ConfigError,
  CONFIG_ENV_VAR,
  CONFIG_FILE_NAME,
  CACHE_TIMEOUT_MS
} from './config.js';
export type { InspectConfig, InspectDefaults, FilterRule, ConfigErrorReason } from './config.js';
