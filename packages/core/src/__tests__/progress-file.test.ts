/**
 * Progress file tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import {
  formatSnapshot,
  parseSnapshot,
  readProgressFile,
  serializeSnapshot,
  writeProgressFile,
} from '../progress-file.js';

describe('serializeSnapshot', () => {
  it('should use a fixed key order without whitespace', () => {
    const content = serializeSnapshot({ percentage: 42, total: 1000, downloaded: 420 });
    expect(content).toBe('{"downloaded":420,"total":1000,"percentage":42}');
  });
});

describe('parseSnapshot', () => {
  it('should parse a complete snapshot', () => {
    expect(parseSnapshot('{"downloaded":420,"total":1000,"percentage":42}')).toEqual({
      downloaded: 420,
      total: 1000,
      percentage: 42,
    });
  });

  it('should return null for empty content', () => {
    expect(parseSnapshot('')).toBeNull();
    expect(parseSnapshot('  \n')).toBeNull();
  });

  it('should return null for a half-written document', () => {
    expect(parseSnapshot('{"downloaded":420,"tot')).toBeNull();
  });

  it('should return null when keys are missing or invalid', () => {
    expect(parseSnapshot('{"downloaded":420,"total":1000}')).toBeNull();
    expect(parseSnapshot('{"downloaded":-1,"total":1000,"percentage":0}')).toBeNull();
    expect(parseSnapshot('{"downloaded":1,"total":2,"percentage":50.5}')).toBeNull();
    expect(parseSnapshot('[1,2,3]')).toBeNull();
  });
});

describe('formatSnapshot', () => {
  it('should show byte counts when the total is known', () => {
    expect(formatSnapshot({ downloaded: 420, total: 1000, percentage: 42 })).toBe(
      ' 42.00%  (420/1000 bytes)',
    );
  });

  it('should fall back to percent-only mode', () => {
    expect(formatSnapshot({ downloaded: 0, total: 0, percentage: 100 })).toBe(
      '100.00%  (percent-only)',
    );
    expect(formatSnapshot({ downloaded: 0, total: 0, percentage: 5 })).toBe(
      '  5.00%  (percent-only)',
    );
  });
});

describe('writeProgressFile / readProgressFile', () => {
  let tempDir: string;
  let progressFile: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'depot-progress-file-'));
    progressFile = path.join(tempDir, 'progress.json');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should replace longer content completely', () => {
    writeProgressFile(progressFile, { downloaded: 123456789, total: 987654321, percentage: 12 });
    writeProgressFile(progressFile, { downloaded: 1, total: 2, percentage: 50 });

    expect(fs.readFileSync(progressFile, 'utf-8')).toBe(
      '{"downloaded":1,"total":2,"percentage":50}',
    );
  });

  it('should rename over the target in atomic mode', () => {
    fs.writeFileSync(progressFile, 'stale');
    writeProgressFile(progressFile, { downloaded: 5, total: 10, percentage: 50 }, true);

    expect(fs.readdirSync(tempDir)).toEqual(['progress.json']);
    expect(fs.readFileSync(progressFile, 'utf-8')).toBe(
      '{"downloaded":5,"total":10,"percentage":50}',
    );
  });

  it('should throw for a missing directory', () => {
    const nested = path.join(tempDir, 'missing', 'progress.json');
    expect(() => writeProgressFile(nested, { downloaded: 0, total: 0, percentage: 0 })).toThrow();
    expect(() =>
      writeProgressFile(nested, { downloaded: 0, total: 0, percentage: 0 }, true),
    ).toThrow();
  });

  it('should read back what was written', async () => {
    writeProgressFile(progressFile, { downloaded: 420, total: 1000, percentage: 42 });

    await expect(readProgressFile(progressFile)).resolves.toEqual({
      downloaded: 420,
      total: 1000,
      percentage: 42,
    });
  });

  it('should return null for a missing file', async () => {
    await expect(readProgressFile(progressFile)).resolves.toBeNull();
  });

  it('should return null for a truncated file', async () => {
    fs.writeFileSync(progressFile, '');
    await expect(readProgressFile(progressFile)).resolves.toBeNull();
  });
});
