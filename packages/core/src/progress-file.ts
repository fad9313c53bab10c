/**
 * Progress snapshot file: a compact JSON document that is rewritten on every
 * report and polled by external tools.
 *
 *   {"downloaded":420,"total":1000,"percentage":42}
 */

import * as fs from 'node:fs';
import { readFile } from 'node:fs/promises';
import * as path from 'node:path';

import { z } from 'zod';

/**
 * Current transfer state at the moment of a report
 */
export interface ProgressSnapshot {
  downloaded: number;
  total: number;
  percentage: number;
}

/**
 * Environment variable naming the progress file
 */
export const PROGRESS_FILE_ENV = 'DEPOTDOWNLOADER_PROGRESS_FILE';

const countSchema = z.number().int().nonnegative();

export const progressSnapshotSchema = z.object({
  downloaded: countSchema,
  total: countSchema,
  percentage: z.number().int().min(0).max(255),
});

/**
 * Serialize a snapshot with a fixed key order and no whitespace
 */
export function serializeSnapshot(snapshot: ProgressSnapshot): string {
  return JSON.stringify({
    downloaded: snapshot.downloaded,
    total: snapshot.total,
    percentage: snapshot.percentage,
  });
}

/**
 * Overwrite the progress file with a snapshot.
 *
 * By default the file is truncated and rewritten in place, so a reader polling
 * at the wrong moment may see an empty file. With `atomic` the document goes to
 * a sibling temp file that is renamed over the target.
 *
 * @throws on any I/O failure; the reporter swallows it
 */
export function writeProgressFile(
  filePath: string,
  snapshot: ProgressSnapshot,
  atomic: boolean = false,
): void {
  const content = serializeSnapshot(snapshot);

  if (!atomic) {
    fs.writeFileSync(filePath, content, { encoding: 'utf-8', flag: 'w' });
    return;
  }

  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.tmp`,
  );
  try {
    fs.writeFileSync(tempPath, content, { encoding: 'utf-8', flag: 'w' });
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

/**
 * Parse progress file content. Returns null for anything that is not a
 * complete snapshot, including the empty or half-written file a reader sees
 * while the writer is truncating.
 */
export function parseSnapshot(content: string): ProgressSnapshot | null {
  if (content.trim() === '') return null;

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return null;
  }

  const result = progressSnapshotSchema.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Read the current snapshot, or null if the file is missing or unreadable
 */
export async function readProgressFile(filePath: string): Promise<ProgressSnapshot | null> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch {
    return null;
  }
  return parseSnapshot(content);
}

/**
 * Format a snapshot for display, e.g. " 42.00%  (420/1000 bytes)"
 */
export function formatSnapshot(snapshot: ProgressSnapshot): string {
  const pct = snapshot.percentage.toFixed(2).padStart(6, ' ');
  if (snapshot.total > 0) {
    return `${pct}%  (${snapshot.downloaded}/${snapshot.total} bytes)`;
  }
  return `${pct}%  (percent-only)`;
}
