/**
 * Simulate command implementation
 *
 * Drives the reporter the way a downloader does: one report per received
 * chunk, then a final report that hides the terminal indicator.
 */

import { setTimeout as sleep } from 'node:timers/promises';

import {
  ProgressState,
  computePercent,
  type ProgressReporter,
  type ProgressSnapshot,
} from '@depot-progress/core';

import { loadConfig, type CliOptions, type SimulateConfigSchema } from '../config/index.js';
import { ProgressDisplay } from '../progress/display.js';
import { formatFileSize } from '../progress/formatters.js';

import { createReporter, printConfig } from './shared.js';

export type SimulationResult = 'complete' | 'aborted';

export interface SimulationOptions {
  signal?: AbortSignal;
  onProgress?: (snapshot: ProgressSnapshot) => void;
}

/**
 * Run a simulated download against a reporter
 */
export async function runSimulation(
  reporter: ProgressReporter,
  settings: SimulateConfigSchema,
  options: SimulationOptions = {},
): Promise<SimulationResult> {
  const { totalBytes, chunkBytes, intervalMs } = settings;
  const { signal, onProgress } = options;
  let downloaded = 0;

  do {
    if (signal?.aborted) {
      reporter.report(
        ProgressState.Error,
        computePercent(downloaded, totalBytes),
        downloaded,
        totalBytes,
      );
      return 'aborted';
    }

    downloaded = Math.min(totalBytes, downloaded + chunkBytes);
    reporter.reportTransfer(downloaded, totalBytes);
    onProgress?.({
      downloaded,
      total: totalBytes,
      percentage: computePercent(downloaded, totalBytes),
    });

    if (downloaded < totalBytes && intervalMs > 0) {
      try {
        await sleep(intervalMs, undefined, { signal });
      } catch (error) {
        if (!signal?.aborted) throw error;
      }
    }
  } while (downloaded < totalBytes);

  // Keep the final counts in the file so watchers still see completion
  reporter.report(
    ProgressState.Hidden,
    computePercent(downloaded, totalBytes),
    downloaded,
    totalBytes,
  );
  return 'complete';
}

/**
 * Main simulate command handler
 */
export async function simulateCommand(options: CliOptions): Promise<void> {
  const config = await loadConfig(options);

  if (options.showConfig) {
    printConfig(config);
    return;
  }

  const reporter = createReporter(config);
  const display = new ProgressDisplay({
    color: config.output.color,
    debug: config.reporter.debug,
  });

  reporter.initialize();
  display.printDebug(
    `terminal progress ${reporter.config.terminalProgressEnabled ? 'enabled' : 'disabled'}`,
  );

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  display.startTransfer(`Downloading ${formatFileSize(config.simulate.totalBytes)}`);
  try {
    const result = await runSimulation(reporter, config.simulate, {
      signal: controller.signal,
      onProgress: (snapshot) => display.updateTransfer(snapshot),
    });

    if (result === 'complete') {
      display.completeTransfer('Download complete');
    } else {
      display.failTransfer('interrupted');
      process.exitCode = 130;
    }
  } finally {
    process.off('SIGINT', onSigint);
    display.stop();
  }
}
