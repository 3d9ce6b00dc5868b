// Shared configuration: env-resolved solver defaults and log level.

export {
  loadConfig,
  getConfig,
  resetConfig,
  ConfigError,
  DEFAULT_CONFIG,
  type RowspaceConfig,
} from './settings.js'

export {
  envSchema,
  iterationOptionsSchema,
  logLevelSchema,
  LOG_LEVELS,
  type LogLevel,
} from './schema.js'
