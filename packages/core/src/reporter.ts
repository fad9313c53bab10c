/**
 * Download progress reporter
 *
 * Emits the OSC 9;4 progress sequence to capable terminals and mirrors every
 * report into an optional JSON snapshot file. Reporting is best effort: no
 * operation on this class throws, whatever happens to stdout or the file.
 */

import {
  ChalkCapabilityDetector,
  type TerminalCapabilityDetector,
} from './capabilities.js';
import { createColorFns, type ColorFunctions } from './colors.js';
import { PROGRESS_FILE_ENV, writeProgressFile } from './progress-file.js';
import { ProgressState } from './progress-state.js';

const ESC = '\x1b';
const BEL = '\x07';

/**
 * Anything with a TTY flag (process.stdin, process.stdout)
 */
export interface TtyLike {
  isTTY?: boolean;
}

/**
 * Minimal writable stream surface used by the reporter. Real streams report
 * some failures after write() returns, through the callback and an 'error'
 * event; the optional members let the reporter consume those too.
 */
export interface OutputStream extends TtyLike {
  readonly writable?: boolean;
  write(chunk: string, callback?: (error?: Error | null) => void): boolean;
  once?(event: 'error', listener: (error: Error) => void): unknown;
  removeListener?(event: 'error', listener: (error: Error) => void): unknown;
}

/**
 * Resolved reporter state, refreshed by initialize()
 */
export interface ReporterConfig {
  terminalProgressEnabled: boolean;
  progressFilePath: string | undefined;
  announced: boolean;
}

export interface ProgressReporterOptions {
  /** Environment to read the progress file variable from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Platform used for terminal gating (default: process.platform) */
  platform?: NodeJS.Platform;
  stdin?: TtyLike;
  /** Receives progress sequences and the announcement (default: process.stdout) */
  stdout?: OutputStream;
  /** Receives debug lines (default: process.stderr) */
  stderr?: OutputStream;
  /**
   * Terminal capability source. Without one, terminal progress is enabled on
   * Windows and disabled elsewhere.
   */
  capabilities?: TerminalCapabilityDetector;
  /** Write the progress file through temp file + rename (default: false) */
  atomicWrites?: boolean;
  /** Print swallowed failures to stderr (default: false) */
  debug?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
}

/**
 * Build the OSC 9;4 sequence for a state and percentage
 */
export function formatProgressSequence(state: ProgressState, percent: number): string {
  return `${ESC}]9;4;${state};${toPercentByte(percent)}${BEL}`;
}

/**
 * Coerce a percentage into the 0-255 byte range
 */
export function toPercentByte(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(255, Math.max(0, Math.trunc(value)));
}

/**
 * Coerce a byte count into a non-negative safe integer. Counts above
 * Number.MAX_SAFE_INTEGER (8 PiB) are clamped to it.
 */
export function toByteCount(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(Number.MAX_SAFE_INTEGER, Math.max(0, Math.trunc(value)));
}

/**
 * Derive the percentage of a transfer, rounded to the nearest integer.
 * A zero total yields 0; downloaded > total may exceed 100.
 */
export function computePercent(downloaded: number, total: number): number {
  const done = toByteCount(downloaded);
  const size = toByteCount(total);
  if (size === 0) return 0;
  return toPercentByte(Math.round((done / size) * 100));
}

export class ProgressReporter {
  private terminalProgressEnabled = false;
  private progressFilePath: string | undefined;
  private announced = false;

  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: NodeJS.Platform;
  private readonly stdin: TtyLike;
  private readonly stdout: OutputStream;
  private readonly stderr: OutputStream;
  private readonly capabilities: TerminalCapabilityDetector | undefined;
  private readonly atomicWrites: boolean;
  private debug: boolean;
  private c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.env = options.env ?? process.env;
    this.platform = options.platform ?? process.platform;
    this.stdin = options.stdin ?? process.stdin;
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.capabilities = options.capabilities;
    this.atomicWrites = options.atomicWrites ?? false;
    this.debug = options.debug ?? false;
    this.c = createColorFns(options.color ?? true);
  }

  /**
   * Snapshot of the resolved configuration
   */
  get config(): Readonly<ReporterConfig> {
    return {
      terminalProgressEnabled: this.terminalProgressEnabled,
      progressFilePath: this.progressFilePath,
      announced: this.announced,
    };
  }

  /**
   * Resolve the progress file and terminal support. Safe to call repeatedly;
   * the progress file is announced only the first time one is activated.
   */
  initialize(): void {
    const filePath = this.env[PROGRESS_FILE_ENV]?.trim();
    this.progressFilePath = filePath ? filePath : undefined;

    if (this.progressFilePath && !this.announced) {
      this.announced = true;
      this.writeSafe(`Progress file: ${this.c.cyan(this.progressFilePath)}\n`, 'announcement');
    }

    this.terminalProgressEnabled = this.detectTerminalProgress();
  }

  /**
   * Report a transfer, deriving the percentage from the byte counts.
   * Counts are clamped to 0..Number.MAX_SAFE_INTEGER.
   */
  reportTransfer(downloaded: number, total: number): void {
    this.report(ProgressState.Default, computePercent(downloaded, total), downloaded, total);
  }

  /**
   * Emit a progress report to the terminal and the progress file.
   * The percentage is truncated to 0-255; byte counts are truncated and
   * clamped to 0..Number.MAX_SAFE_INTEGER, so counts past 2^53 are not exact.
   */
  report(
    state: ProgressState,
    percent: number = 0,
    downloaded: number = 0,
    total: number = 0,
  ): void {
    const percentage = toPercentByte(percent);

    if (this.terminalProgressEnabled) {
      this.writeSafe(formatProgressSequence(state, percentage), 'terminal progress');
    }

    if (!this.progressFilePath) return;

    try {
      writeProgressFile(
        this.progressFilePath,
        { downloaded: toByteCount(downloaded), total: toByteCount(total), percentage },
        this.atomicWrites,
      );
    } catch (error) {
      this.logFailure(`progress file ${this.progressFilePath}`, error);
    }
  }

  private detectTerminalProgress(): boolean {
    // Redirected streams would capture the raw sequence
    if (!this.stdin.isTTY || !this.stdout.isTTY) return false;

    // Linux terminals ignore OSC 9;4
    if (this.platform === 'linux') return false;

    if (!this.capabilities) return this.platform === 'win32';

    try {
      const { supportsAnsi, legacyConsole } = this.capabilities.detect();
      return supportsAnsi && !legacyConsole;
    } catch (error) {
      this.logFailure('capability detection', error);
      return false;
    }
  }

  private writeSafe(text: string, context: string): void {
    writeGuarded(this.stdout, text, (error) => this.logFailure(context, error));
  }

  private logFailure(context: string, error: unknown): void {
    if (!this.debug) return;

    const message = error instanceof Error ? error.message : String(error);
    writeGuarded(this.stderr, this.c.dim(`[depot-progress] ${context}: ${message}`) + '\n', () => {
      // stderr is gone too; stop trying
      this.debug = false;
    });
  }
}

/**
 * Write without letting a failure escape, whether write() throws or the
 * stream reports it later. Destroyed streams are skipped.
 */
function writeGuarded(
  stream: OutputStream,
  text: string,
  onFailure: (error: unknown) => void,
): void {
  if (stream.writable === false) return;

  let failed = false;
  const fail = (error: unknown): void => {
    if (failed) return;
    failed = true;
    onFailure(error);
  };
  const onError = (error: Error): void => fail(error);

  stream.once?.('error', onError);
  try {
    stream.write(text, (error) => {
      // After a failed write the listener stays to take the 'error' event that follows
      if (error) fail(error);
      else stream.removeListener?.('error', onError);
    });
  } catch (error) {
    stream.removeListener?.('error', onError);
    fail(error);
  }
}

/**
 * Create a reporter that detects terminal capabilities through chalk
 */
export function createProgressReporter(options: ProgressReporterOptions = {}): ProgressReporter {
  return new ProgressReporter({
    capabilities: new ChalkCapabilityDetector({ env: options.env, platform: options.platform }),
    ...options,
  });
}

let defaultReporter: ProgressReporter | null = null;

/**
 * Process-wide reporter behind initialize() / report() / reportTransfer()
 */
export function getProgressReporter(): ProgressReporter {
  if (!defaultReporter) {
    defaultReporter = createProgressReporter();
  }
  return defaultReporter;
}

export function initialize(): void {
  getProgressReporter().initialize();
}

export function report(
  state: ProgressState,
  percent?: number,
  downloaded?: number,
  total?: number,
): void {
  getProgressReporter().report(state, percent, downloaded, total);
}

export function reportTransfer(downloaded: number, total: number): void {
  getProgressReporter().reportTransfer(downloaded, total);
}
