/**
 * Terminal progress states for the OSC 9;4 sequence
 *
 * @see https://learn.microsoft.com/en-us/windows/terminal/tutorials/progress-bar-sequences
 * @see https://conemu.github.io/en/AnsiEscapeCodes.html#ConEmu_specific_OSC
 */

export const ProgressState = {
  Hidden: 0,
  Default: 1,
  Error: 2,
  Indeterminate: 3,
  Warning: 4,
} as const;

export type ProgressState = (typeof ProgressState)[keyof typeof ProgressState];

/**
 * Lower-case state names accepted on the command line
 */
export type ProgressStateName = 'hidden' | 'default' | 'error' | 'indeterminate' | 'warning';

export const PROGRESS_STATE_NAMES: Record<ProgressStateName, ProgressState> = {
  hidden: ProgressState.Hidden,
  default: ProgressState.Default,
  error: ProgressState.Error,
  indeterminate: ProgressState.Indeterminate,
  warning: ProgressState.Warning,
};

/**
 * Look up a state by its command line name (case-insensitive)
 */
export function parseProgressState(name: string): ProgressState | undefined {
  const key = name.trim().toLowerCase();
  if (!isProgressStateName(key)) return undefined;
  return PROGRESS_STATE_NAMES[key];
}

function isProgressStateName(value: string): value is ProgressStateName {
  return Object.prototype.hasOwnProperty.call(PROGRESS_STATE_NAMES, value);
}
