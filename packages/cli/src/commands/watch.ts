/**
 * Watch command implementation
 */

import { watchProgressFile } from '@depot-progress/core';

import { loadConfig, type CliOptions } from '../config/index.js';
import { CliError, resolveAbsolutePath } from '../errors/index.js';
import { ProgressDisplay } from '../progress/display.js';
import { formatDuration } from '../progress/formatters.js';

import { printConfig } from './shared.js';

/**
 * Main watch command handler
 */
export async function watchCommand(file: string, options: CliOptions): Promise<void> {
  const config = await loadConfig(options);

  if (options.showConfig) {
    printConfig(config);
    return;
  }

  const filePath = resolveAbsolutePath(file);
  const display = new ProgressDisplay({
    color: config.output.color,
    debug: config.reporter.debug,
  });

  const controller = new AbortController();
  const { timeoutMs, pollIntervalMs } = config.watch;
  let timedOut = false;
  const timer =
    timeoutMs !== undefined
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, timeoutMs)
      : null;
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  display.printDebug(`polling ${filePath} every ${formatDuration(pollIntervalMs)}`);
  display.startTransfer('Downloading');

  try {
    const result = await watchProgressFile(filePath, {
      intervalMs: pollIntervalMs,
      signal: controller.signal,
      onSnapshot: (snapshot) => display.updateTransfer(snapshot),
    });

    if (result.status === 'complete') {
      display.completeTransfer('Download complete');
      return;
    }

    display.failTransfer(timedOut ? 'timed out' : 'interrupted');
    if (timedOut && timeoutMs !== undefined) {
      throw new CliError(
        `No completion reported within ${formatDuration(timeoutMs)}`,
        `Check that the downloader runs with DEPOTDOWNLOADER_PROGRESS_FILE=${filePath}`,
        2,
      );
    }
    process.exitCode = 130;
  } finally {
    if (timer) clearTimeout(timer);
    process.off('SIGINT', onSigint);
    display.stop();
  }
}
