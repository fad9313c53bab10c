/**
 * Progress file polling for external consumers
 */

import { setTimeout as sleep } from 'node:timers/promises';

import { readProgressFile, type ProgressSnapshot } from './progress-file.js';

export const DEFAULT_POLL_INTERVAL_MS = 1000;

export interface WatchOptions {
  /** Delay between reads (default: 1000ms) */
  intervalMs?: number;
  /** Stops the watch; the promise resolves with status 'aborted' */
  signal?: AbortSignal;
  /** Called whenever the percentage changes */
  onSnapshot?: (snapshot: ProgressSnapshot) => void;
}

export type WatchStatus = 'complete' | 'aborted';

export interface WatchResult {
  status: WatchStatus;
  /** Last complete snapshot read, if any */
  snapshot: ProgressSnapshot | null;
}

/**
 * Poll a progress file until it reports 100% or the signal aborts.
 * Missing, empty and half-written files are skipped, never raised.
 */
export async function watchProgressFile(
  filePath: string,
  options: WatchOptions = {},
): Promise<WatchResult> {
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const { signal, onSnapshot } = options;

  let last: ProgressSnapshot | null = null;

  while (!signal?.aborted) {
    const snapshot = await readProgressFile(filePath);

    if (snapshot) {
      if (!last || snapshot.percentage !== last.percentage) {
        onSnapshot?.(snapshot);
      }
      last = snapshot;

      if (snapshot.percentage >= 100) {
        return { status: 'complete', snapshot };
      }
    }

    try {
      await sleep(intervalMs, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) break;
      throw error;
    }
  }

  return { status: 'aborted', snapshot: last };
}
