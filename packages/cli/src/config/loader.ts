/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { CliOptions, DepotProgressConfig, PartialDepotProgressConfig } from './schema.js';
import { ConfigValidationError, validateConfig, validatePartialConfig } from './validation.js';

/**
 * Environment variables read by the CLI.
 * DEPOTDOWNLOADER_PROGRESS_FILE is read by the core reporter itself.
 */
export const ENV_VARS = {
  pollInterval: 'DEPOT_PROGRESS_POLL_INTERVAL',
  timeout: 'DEPOT_PROGRESS_TIMEOUT',
  atomicWrites: 'DEPOT_PROGRESS_ATOMIC_WRITES',
  debug: 'DEPOT_PROGRESS_DEBUG',
  color: 'DEPOT_PROGRESS_COLOR',
} as const;

export interface LoadConfigOptions {
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory searched for a config file (default: process.cwd()) */
  cwd?: string;
}

/**
 * Deep clone an object
 */
function deepClone<T>(obj: T): T {
  return JSON.parse(JSON.stringify(obj)) as T;
}

/**
 * Deep merge two configurations; source values override target values
 */
function deepMerge(
  target: DepotProgressConfig,
  source: PartialDepotProgressConfig,
): DepotProgressConfig {
  const result = deepClone(target);

  if (source.reporter) {
    result.reporter = { ...result.reporter, ...source.reporter };
  }
  if (source.watch) {
    result.watch = { ...result.watch, ...source.watch };
  }
  if (source.simulate) {
    result.simulate = { ...result.simulate, ...source.simulate };
  }
  if (source.output) {
    result.output = { ...result.output, ...source.output };
  }

  return result;
}

/**
 * Drop undefined entries so they do not override lower layers
 */
function defined<T extends object>(values: T): Partial<T> | undefined {
  const entries = Object.entries(values).filter(([, value]) => value !== undefined);
  return entries.length > 0 ? (Object.fromEntries(entries) as Partial<T>) : undefined;
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

function parseNumberEnv(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  const num = Number(value);
  if (Number.isNaN(num)) {
    throw new ConfigValidationError([{ path: name, message: `Expected a number, got "${value}"` }]);
  }
  return num;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv): PartialDepotProgressConfig {
  const config: PartialDepotProgressConfig = {};

  const reporter = defined({
    atomicWrites: parseBooleanEnv(env[ENV_VARS.atomicWrites]),
    debug: parseBooleanEnv(env[ENV_VARS.debug]),
  });
  if (reporter) config.reporter = reporter;

  const watch = defined({
    pollIntervalMs: parseNumberEnv(ENV_VARS.pollInterval, env[ENV_VARS.pollInterval]),
    timeoutMs: parseNumberEnv(ENV_VARS.timeout, env[ENV_VARS.timeout]),
  });
  if (watch) config.watch = watch;

  const output = defined({ color: parseBooleanEnv(env[ENV_VARS.color]) });
  if (output) config.output = output;

  return config;
}

/**
 * Load configuration from config file using cosmiconfig
 */
async function loadConfigFile(
  configPath: string | undefined,
  cwd: string,
): Promise<PartialDepotProgressConfig | null> {
  const explorer = cosmiconfig('depotprogress', {
    packageProp: 'depotProgress',
    searchPlaces: [
      'package.json',
      '.depotprogressrc',
      '.depotprogressrc.json',
      '.depotprogressrc.yaml',
      '.depotprogressrc.yml',
      'depot-progress.config.js',
      'depot-progress.config.cjs',
    ],
  });

  let result: CosmiconfigResult;
  try {
    result = configPath ? await explorer.load(configPath) : await explorer.search(cwd);
  } catch (error) {
    throw new ConfigError(
      configPath ? `Failed to load config file: ${configPath}` : 'Failed to load config file',
      error instanceof Error ? error.message : undefined,
    );
  }

  if (!result || result.isEmpty) {
    return null;
  }

  return validatePartialConfig(result.config);
}

/**
 * Map CLI options to config object
 */
export function mapCliToConfig(options: CliOptions): PartialDepotProgressConfig {
  const config: PartialDepotProgressConfig = {};

  const reporter = defined({ atomicWrites: options.atomic, debug: options.debug });
  if (reporter) config.reporter = reporter;

  const watch = defined({ pollIntervalMs: options.interval, timeoutMs: options.timeout });
  if (watch) config.watch = watch;

  const simulate = defined({
    totalBytes: options.total,
    chunkBytes: options.chunk,
    intervalMs: options.delay,
  });
  if (simulate) config.simulate = simulate;

  if (options.noColor) {
    config.output = { color: false };
  }

  return config;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  options: LoadConfigOptions = {},
): Promise<DepotProgressConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let config = deepClone(DEFAULT_CONFIG);

  const fileConfig = await loadConfigFile(cliOptions.config, cwd);
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }

  config = deepMerge(config, loadEnvConfig(env));
  config = deepMerge(config, mapCliToConfig(cliOptions));

  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: DepotProgressConfig): string {
  return JSON.stringify(config, null, 2);
}
