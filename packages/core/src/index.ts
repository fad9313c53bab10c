/**
 * @depot-progress/core - Download progress reporting
 *
 * - OSC 9;4 terminal progress for capable terminal emulators
 * - JSON snapshot file for external tools (DEPOTDOWNLOADER_PROGRESS_FILE)
 * - Reader and watcher for that file
 */

export const VERSION = '0.1.0';

export {
  ProgressState,
  PROGRESS_STATE_NAMES,
  parseProgressState,
  type ProgressStateName,
} from './progress-state.js';

export {
  ChalkCapabilityDetector,
  isLegacyWindowsConsole,
  MIN_VT_WINDOWS_BUILD,
  type ChalkCapabilityDetectorOptions,
  type TerminalCapabilities,
  type TerminalCapabilityDetector,
} from './capabilities.js';

export { createColorFns, type ColorFn, type ColorFunctions } from './colors.js';

export {
  PROGRESS_FILE_ENV,
  progressSnapshotSchema,
  serializeSnapshot,
  parseSnapshot,
  writeProgressFile,
  readProgressFile,
  formatSnapshot,
  type ProgressSnapshot,
} from './progress-file.js';

export {
  ProgressReporter,
  createProgressReporter,
  getProgressReporter,
  initialize,
  report,
  reportTransfer,
  computePercent,
  formatProgressSequence,
  toPercentByte,
  toByteCount,
  type OutputStream,
  type ProgressReporterOptions,
  type ReporterConfig,
  type TtyLike,
} from './reporter.js';

export {
  watchProgressFile,
  DEFAULT_POLL_INTERVAL_MS,
  type WatchOptions,
  type WatchResult,
  type WatchStatus,
} from './watcher.js';
