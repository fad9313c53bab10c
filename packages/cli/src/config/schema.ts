/**
 * Configuration schema types for the depot-progress CLI
 */

/**
 * Core reporter settings
 */
export interface ReporterConfigSchema {
  /** Write the progress file through temp file + rename */
  atomicWrites: boolean;
  /** Print swallowed reporter failures to stderr */
  debug: boolean;
}

/**
 * Progress file watching
 */
export interface WatchConfigSchema {
  /** Delay between reads of the progress file (ms) */
  pollIntervalMs: number;
  /** Give up after this long (ms); unset waits forever */
  timeoutMs?: number;
}

/**
 * Simulated download used by the `simulate` command
 */
export interface SimulateConfigSchema {
  totalBytes: number;
  chunkBytes: number;
  /** Delay between chunks (ms) */
  intervalMs: number;
}

export interface OutputConfigSchema {
  /** Enable colored output */
  color: boolean;
}

/**
 * Complete depot-progress configuration
 */
export interface DepotProgressConfig {
  reporter: ReporterConfigSchema;
  watch: WatchConfigSchema;
  simulate: SimulateConfigSchema;
  output: OutputConfigSchema;
}

/**
 * Configuration as found in a file or the environment
 */
export type PartialDepotProgressConfig = {
  [K in keyof DepotProgressConfig]?: Partial<DepotProgressConfig[K]>;
};

/**
 * Options collected from the command line
 */
export interface CliOptions {
  /** Path to config file */
  config?: string;
  /** Disable colored output */
  noColor?: boolean;
  debug?: boolean;
  /** Print resolved configuration and exit */
  showConfig?: boolean;
  atomic?: boolean;
  /** Poll interval for watch/run (ms) */
  interval?: number;
  /** Timeout for watch/run (ms) */
  timeout?: number;
  /** Simulated download size (bytes) */
  total?: number;
  /** Simulated chunk size (bytes) */
  chunk?: number;
  /** Delay between simulated chunks (ms) */
  delay?: number;
  /** Progress state name for `report` */
  state?: string;
  /** Explicit percentage for `report` */
  percent?: number;
}
