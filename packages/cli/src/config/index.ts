/**
 * Configuration module exports
 */

export type {
  CliOptions,
  DepotProgressConfig,
  OutputConfigSchema,
  PartialDepotProgressConfig,
  ReporterConfigSchema,
  SimulateConfigSchema,
  WatchConfigSchema,
} from './schema.js';

export {
  DEFAULT_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_REPORTER_CONFIG,
  DEFAULT_SIMULATE_CONFIG,
  DEFAULT_WATCH_CONFIG,
} from './defaults.js';

export {
  configSchema,
  partialConfigSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
} from './validation.js';

export { ENV_VARS, loadConfig, loadEnvConfig, mapCliToConfig, formatConfig } from './loader.js';
