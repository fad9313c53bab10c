/**
 * Output formatting utilities
 */

import chalk from 'chalk';

import type { DepotProgressConfig } from '../config/schema.js';

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: DepotProgressConfig): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Configuration:'));
  lines.push('');

  lines.push(chalk.dim('Reporter:'));
  lines.push(`  Atomic writes: ${config.reporter.atomicWrites}`);
  if (config.reporter.debug) {
    lines.push(`  Debug: ${chalk.yellow('yes')}`);
  }
  lines.push('');

  lines.push(chalk.dim('Watch:'));
  lines.push(`  Poll interval: ${formatDuration(config.watch.pollIntervalMs)}`);
  if (config.watch.timeoutMs !== undefined) {
    lines.push(`  Timeout: ${formatDuration(config.watch.timeoutMs)}`);
  }
  lines.push('');

  lines.push(chalk.dim('Simulate:'));
  lines.push(`  Total size: ${formatFileSize(config.simulate.totalBytes)}`);
  lines.push(`  Chunk size: ${formatFileSize(config.simulate.chunkBytes)}`);
  lines.push(`  Interval: ${formatDuration(config.simulate.intervalMs)}`);
  lines.push('');

  lines.push(chalk.dim('Output:'));
  lines.push(`  Color: ${config.output.color}`);

  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Format a file size in human-readable format
 */
export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  if (bytes < 1024 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  }
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}

/**
 * Format a transfer rate, e.g. "1.5 MB/s"
 */
export function formatRate(bytesPerSecond: number): string {
  return `${formatFileSize(Math.round(bytesPerSecond))}/s`;
}

/**
 * Format estimated time remaining in human-readable format
 * @param ms Milliseconds remaining, or null if unknown
 * @returns Formatted string like "~2m 30s" or empty string if null
 */
export function formatEta(ms: number | null): string {
  if (ms === null) {
    return '';
  }

  if (ms <= 0) {
    return 'almost done';
  }

  if (ms < 1000) {
    return 'less than a second';
  }

  if (ms < 60000) {
    const seconds = Math.ceil(ms / 1000);
    return `~${seconds}s`;
  }

  const minutes = Math.floor(ms / 60000);
  const seconds = Math.ceil((ms % 60000) / 1000);

  if (seconds === 0) {
    return `~${minutes}m`;
  }

  return `~${minutes}m ${seconds}s`;
}

/**
 * Format a progress bar
 * @param percentage Percentage complete; values above 100 render as full
 * @param width Width of the progress bar in characters (default: 20)
 * @returns Formatted progress bar like "[========          ]"
 */
export function formatProgressBar(percentage: number, width: number = 20): string {
  const ratio = Math.min(Math.max(percentage, 0) / 100, 1);
  const filled = Math.round(ratio * width);
  const empty = width - filled;

  return `[${'='.repeat(filled)}${' '.repeat(empty)}]`;
}
