/**
 * Shared types for console display components
 */

export type { ColorFn, ColorFunctions } from '@depot-progress/core';

/**
 * Console display options
 */
export interface ProgressDisplayOptions {
  /** Enable colored output (default: true) */
  color?: boolean;
  /** Print debug lines (default: false) */
  debug?: boolean;
}
