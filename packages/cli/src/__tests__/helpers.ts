/**
 * Reporter fixtures shared by the command tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { PROGRESS_FILE_ENV, ProgressReporter } from '@depot-progress/core';

export interface FakeStream {
  isTTY: boolean;
  chunks: string[];
  write(chunk: string): boolean;
}

export function createStream(isTTY: boolean): FakeStream {
  const chunks: string[] = [];
  return {
    isTTY,
    chunks,
    write(chunk: string): boolean {
      chunks.push(chunk);
      return true;
    },
  };
}

export interface ReporterFixture {
  reporter: ProgressReporter;
  stdout: FakeStream;
  file: string;
  dir: string;
  /** OSC sequences written after the announcement */
  sequences(): string[];
  readFile(): string;
  cleanup(): void;
}

/**
 * A Windows-terminal reporter writing into a fresh temp directory
 */
export function createReporterFixture(): ReporterFixture {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'depot-progress-cli-'));
  const file = path.join(dir, 'progress.json');
  const stdout = createStream(true);
  const reporter = new ProgressReporter({
    env: { [PROGRESS_FILE_ENV]: file },
    platform: 'win32',
    stdin: { isTTY: true },
    stdout,
    stderr: createStream(false),
    color: false,
  });
  reporter.initialize();

  return {
    reporter,
    stdout,
    file,
    dir,
    sequences: () => stdout.chunks.filter((chunk) => chunk.startsWith('\x1b]9;4;')),
    readFile: () => fs.readFileSync(file, 'utf8'),
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}
