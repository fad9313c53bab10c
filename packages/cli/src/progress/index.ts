/**
 * Progress module exports
 */

export type { ColorFn, ColorFunctions, ProgressDisplayOptions } from './types.js';
export { ProgressDisplay, formatTransferLine } from './display.js';
export { TransferEstimator } from './transfer-estimator.js';
export {
  formatConfigDisplay,
  formatDuration,
  formatEta,
  formatFileSize,
  formatProgressBar,
  formatRate,
} from './formatters.js';
