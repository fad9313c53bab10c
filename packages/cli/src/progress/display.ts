/**
 * Console display with ora spinners
 *
 * Spinners and messages go to stderr/stdout like any CLI output; the OSC
 * progress sequence itself is written by the core reporter.
 */

import { createColorFns, formatSnapshot, type ProgressSnapshot } from '@depot-progress/core';
import ora, { type Ora, type Color } from 'ora';

import { formatEta, formatProgressBar, formatRate } from './formatters.js';
import { TransferEstimator } from './transfer-estimator.js';
import type { ColorFunctions, ProgressDisplayOptions } from './types.js';

/**
 * Build the spinner text for a snapshot
 */
export function formatTransferLine(
  label: string,
  snapshot: ProgressSnapshot,
  estimator: TransferEstimator | null,
  c: ColorFunctions,
): string {
  const bar = formatProgressBar(snapshot.percentage);
  let line = `${label} ${bar} ${formatSnapshot(snapshot).trimStart()}`;

  if (estimator && snapshot.total > 0) {
    const rate = estimator.bytesPerSecond();
    const eta = formatEta(estimator.estimateRemaining(snapshot.downloaded, snapshot.total));
    const details = [rate !== null ? formatRate(rate) : '', eta ? `${eta} remaining` : '']
      .filter((part) => part !== '')
      .join(', ');
    if (details) {
      line += c.dim(` (${details})`);
    }
  }

  return line;
}

export class ProgressDisplay {
  private spinner: Ora | null = null;
  private label = '';
  private startTime = 0;
  private readonly useColor: boolean;
  private readonly debug: boolean;
  private readonly estimator = new TransferEstimator();
  private readonly c: ColorFunctions;

  constructor(options: ProgressDisplayOptions = {}) {
    this.useColor = options.color ?? true;
    this.debug = options.debug ?? false;
    this.c = createColorFns(this.useColor);
  }

  /**
   * Start a spinner for a transfer
   */
  startTransfer(label: string): void {
    this.label = label;
    this.startTime = Date.now();
    this.estimator.reset();

    if (this.spinner) {
      this.spinner.stop();
    }

    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text: label,
      prefixText: ' ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }

    this.spinner = ora(oraOptions).start();
  }

  /**
   * Show a new snapshot in the spinner
   */
  updateTransfer(snapshot: ProgressSnapshot): void {
    if (!this.spinner) return;

    this.estimator.record(snapshot.downloaded);
    this.spinner.text = formatTransferLine(this.label, snapshot, this.estimator, this.c);
  }

  /**
   * Complete the transfer successfully
   */
  completeTransfer(message: string): void {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 1000 ? this.c.dim(` (${(duration / 1000).toFixed(1)}s)`) : '';

    if (this.spinner) {
      this.spinner.succeed(`${message}${durationStr}`);
      this.spinner = null;
    } else {
      console.log(` ${this.c.green('✓')} ${message}${durationStr}`);
    }
  }

  /**
   * Fail the transfer
   */
  failTransfer(error: string): void {
    if (this.spinner) {
      this.spinner.fail(`${this.label}: ${error}`);
      this.spinner = null;
    } else {
      console.log(` ${this.c.red('✗')} ${this.label}: ${error}`);
    }
  }

  /**
   * Print a plain message
   */
  printMessage(message: string): void {
    console.log(message);
  }

  printSuccess(message: string): void {
    console.log(this.c.green(`✓ ${message}`));
  }

  printWarning(message: string): void {
    console.log(this.c.yellow(`⚠ ${message}`));
  }

  /**
   * Print a debug line to stderr (debug mode only)
   */
  printDebug(message: string): void {
    if (!this.debug) return;
    process.stderr.write(this.c.dim(`[debug] ${message}`) + '\n');
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }
}
