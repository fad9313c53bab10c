/**
 * Default configuration values
 */

import { DEFAULT_POLL_INTERVAL_MS } from '@depot-progress/core';

import type {
  DepotProgressConfig,
  OutputConfigSchema,
  ReporterConfigSchema,
  SimulateConfigSchema,
  WatchConfigSchema,
} from './schema.js';

export const DEFAULT_REPORTER_CONFIG: ReporterConfigSchema = {
  atomicWrites: false,
  debug: false,
};

export const DEFAULT_WATCH_CONFIG: WatchConfigSchema = {
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
};

/**
 * 64 MiB in 1 MiB chunks, one every 100ms
 */
export const DEFAULT_SIMULATE_CONFIG: SimulateConfigSchema = {
  totalBytes: 64 * 1024 * 1024,
  chunkBytes: 1024 * 1024,
  intervalMs: 100,
};

export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  color: true,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: DepotProgressConfig = {
  reporter: DEFAULT_REPORTER_CONFIG,
  watch: DEFAULT_WATCH_CONFIG,
  simulate: DEFAULT_SIMULATE_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};
