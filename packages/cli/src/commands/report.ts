/**
 * Report command implementation
 */

import {
  PROGRESS_STATE_NAMES,
  ProgressState,
  computePercent,
  parseProgressState,
  type ProgressReporter,
} from '@depot-progress/core';

import { loadConfig, type CliOptions } from '../config/index.js';
import { InputError } from '../errors/index.js';

import { createReporter, printConfig } from './shared.js';

/**
 * Emit one report. An explicit state or percentage selects the core report;
 * otherwise the percentage is derived from the byte counts.
 */
export function emitReport(
  reporter: ProgressReporter,
  downloaded: number | undefined,
  total: number | undefined,
  options: Pick<CliOptions, 'state' | 'percent'>,
): void {
  if (options.state !== undefined || options.percent !== undefined) {
    const state =
      options.state !== undefined ? parseProgressState(options.state) : ProgressState.Default;
    if (state === undefined) {
      throw new InputError(
        `Unknown progress state: ${options.state}`,
        `Use one of: ${Object.keys(PROGRESS_STATE_NAMES).join(', ')}`,
      );
    }

    const percent =
      options.percent ??
      (downloaded !== undefined && total !== undefined ? computePercent(downloaded, total) : 0);
    reporter.report(state, percent, downloaded ?? 0, total ?? 0);
    return;
  }

  if (downloaded === undefined || total === undefined) {
    throw new InputError(
      'Nothing to report',
      'Pass <downloaded> <total>, or choose a state with --state and --percent',
    );
  }

  reporter.reportTransfer(downloaded, total);
}

/**
 * Main report command handler
 */
export async function reportCommand(
  downloaded: number | undefined,
  total: number | undefined,
  options: CliOptions,
): Promise<void> {
  const config = await loadConfig(options);

  if (options.showConfig) {
    printConfig(config);
    return;
  }

  const reporter = createReporter(config);
  reporter.initialize();
  emitReport(reporter, downloaded, total, options);
}
