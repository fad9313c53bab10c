/**
 * Helpers shared by the command handlers
 */

import { createProgressReporter, type ProgressReporter } from '@depot-progress/core';

import { formatConfig, type DepotProgressConfig } from '../config/index.js';
import { formatConfigDisplay } from '../progress/formatters.js';

/**
 * Create the core reporter for a resolved configuration
 */
export function createReporter(config: DepotProgressConfig): ProgressReporter {
  return createProgressReporter({
    atomicWrites: config.reporter.atomicWrites,
    debug: config.reporter.debug,
    color: config.output.color,
  });
}

/**
 * Print resolved configuration (--show-config)
 */
export function printConfig(config: DepotProgressConfig): void {
  console.log(formatConfigDisplay(config));
  console.log('');
  console.log('Raw configuration:');
  console.log(formatConfig(config));
}
