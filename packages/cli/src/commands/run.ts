/**
 * Run command implementation
 *
 * Starts a downloader with DEPOTDOWNLOADER_PROGRESS_FILE pointing at a fresh
 * temp file, follows that file, and stops the downloader once it reports
 * 100% if it has not exited by itself.
 */

import { spawn as spawnProcess, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { mkdtemp, rm } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import {
  PROGRESS_FILE_ENV,
  formatSnapshot,
  readProgressFile,
  watchProgressFile,
  type ProgressSnapshot,
} from '@depot-progress/core';

import { loadConfig, type CliOptions } from '../config/index.js';
import { CliError, ProcessError } from '../errors/index.js';
import { ProgressDisplay } from '../progress/display.js';
import { formatDuration } from '../progress/formatters.js';

import { printConfig } from './shared.js';

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => ChildProcess;

export interface RunOptions {
  intervalMs: number;
  /** Stop the child after this long without completion */
  timeoutMs?: number;
  /** Stops the child and cleans up, e.g. on SIGINT */
  signal?: AbortSignal;
  /** Base environment for the child (default: process.env) */
  env?: NodeJS.ProcessEnv;
  spawn?: SpawnFn;
  /** Called with the temp progress file once the child is started */
  onStart?: (progressFile: string) => void;
  onSnapshot?: (snapshot: ProgressSnapshot) => void;
}

export interface ChildExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface RunResult {
  /** The progress file reported 100% */
  completed: boolean;
  /** The child was stopped by us rather than exiting by itself */
  terminated: boolean;
  timedOut: boolean;
  /** Stopped through the external signal */
  interrupted: boolean;
  exit: ChildExit;
  snapshot: ProgressSnapshot | null;
}

/**
 * Run a command and follow its progress file
 */
export async function runWithProgress(
  command: string,
  args: readonly string[],
  options: RunOptions,
): Promise<RunResult> {
  const spawn = options.spawn ?? spawnProcess;
  const tempDir = await mkdtemp(path.join(os.tmpdir(), 'depot-progress-'));
  const progressFile = path.join(tempDir, 'progress.json');

  const controller = new AbortController();
  let timedOut = false;
  const timer =
    options.timeoutMs !== undefined
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, options.timeoutMs)
      : null;
  const onAbort = (): void => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  } else {
    options.signal?.addEventListener('abort', onAbort, { once: true });
  }

  try {
    const child = spawn(command, args, {
      env: { ...(options.env ?? process.env), [PROGRESS_FILE_ENV]: progressFile },
      stdio: 'inherit',
    });

    const exited = new Promise<ChildExit>((resolve, reject) => {
      child.once('error', (error) => {
        const suggestion = 'Check that the command exists and is executable';
        reject(new ProcessError(command, error.message, suggestion));
      });
      child.once('exit', (code, signal) => resolve({ code, signal }));
    });
    options.onStart?.(progressFile);

    const watching = watchProgressFile(progressFile, {
      intervalMs: options.intervalMs,
      signal: controller.signal,
      onSnapshot: options.onSnapshot,
    });

    const first = await Promise.race([
      exited.then((exit) => ({ kind: 'exit' as const, exit })),
      watching.then((result) => ({ kind: 'watch' as const, result })),
    ]);

    if (first.kind === 'exit') {
      controller.abort();
      const watched = await watching;
      // The child may have written its last snapshot between two polls
      const snapshot = (await readProgressFile(progressFile)) ?? watched.snapshot;
      return {
        completed: snapshot !== null && snapshot.percentage >= 100,
        terminated: false,
        timedOut: false,
        interrupted: false,
        exit: first.exit,
        snapshot,
      };
    }

    if (child.exitCode === null && child.signalCode === null) {
      child.kill('SIGTERM');
    }
    const exit = await exited;

    return {
      completed: first.result.status === 'complete',
      terminated: true,
      timedOut,
      interrupted: !timedOut && first.result.status === 'aborted',
      exit,
      snapshot: first.result.snapshot,
    };
  } finally {
    if (timer) clearTimeout(timer);
    options.signal?.removeEventListener('abort', onAbort);
    controller.abort();
    await rm(tempDir, { recursive: true, force: true });
  }
}

/**
 * Exit code for the CLI after a run
 */
export function runExitCode(result: RunResult): number {
  if (result.interrupted) return 130;
  if (result.completed && result.terminated) return 0;
  if (result.exit.code !== null) return result.exit.code;
  return result.completed ? 0 : 1;
}

/**
 * Main run command handler
 */
export async function runCommand(
  command: string,
  args: string[],
  options: CliOptions,
): Promise<void> {
  const config = await loadConfig(options);

  if (options.showConfig) {
    printConfig(config);
    return;
  }

  const display = new ProgressDisplay({
    color: config.output.color,
    debug: config.reporter.debug,
  });

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  let result: RunResult;
  try {
    result = await runWithProgress(command, args, {
      intervalMs: config.watch.pollIntervalMs,
      timeoutMs: config.watch.timeoutMs,
      signal: controller.signal,
      onStart: (progressFile) => display.printDebug(`progress file ${progressFile}`),
      onSnapshot: (snapshot) => display.printMessage(formatSnapshot(snapshot)),
    });
  } finally {
    process.off('SIGINT', onSigint);
  }

  if (result.interrupted) {
    display.printWarning(`${command} interrupted`);
    process.exitCode = runExitCode(result);
    return;
  }

  if (result.timedOut) {
    throw new CliError(
      `${command} did not finish within ${formatDuration(config.watch.timeoutMs ?? 0)}`,
      'Increase --timeout or check the downloader output',
      2,
    );
  }

  if (result.completed) {
    display.printSuccess('Download complete.');
  } else {
    display.printWarning(`${command} exited before reporting completion`);
  }

  process.exitCode = runExitCode(result);
}
