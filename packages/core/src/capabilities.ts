/**
 * Terminal capability detection for OSC progress output
 */

import * as os from 'node:os';

import { supportsColor } from 'chalk';

/**
 * Capabilities relevant to the progress escape sequence
 */
export interface TerminalCapabilities {
  /** Terminal interprets ANSI escape sequences */
  supportsAnsi: boolean;
  /** Console accepts output but mangles modern escape sequences */
  legacyConsole: boolean;
}

/**
 * Source of terminal capabilities, injected into the reporter
 */
export interface TerminalCapabilityDetector {
  detect(): TerminalCapabilities;
}

/**
 * First Windows 10 build with virtual terminal processing in conhost
 */
export const MIN_VT_WINDOWS_BUILD = 10586;

/**
 * Options for the chalk-backed detector
 */
export interface ChalkCapabilityDetectorOptions {
  /** Colour support of stdout (default: chalk's detection) */
  colorSupport?: typeof supportsColor;
  platform?: NodeJS.Platform;
  /** OS release string, e.g. "10.0.19045" (default: os.release()) */
  release?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Check whether a Windows console is too old for escape sequences.
 * Windows Terminal and ConEmu advertise themselves through the environment.
 */
export function isLegacyWindowsConsole(
  platform: NodeJS.Platform,
  release: string,
  env: NodeJS.ProcessEnv,
): boolean {
  if (platform !== 'win32') return false;
  if (env['WT_SESSION'] || env['ConEmuANSI'] === 'ON') return false;

  const [major, , build] = release.split('.').map((part) => parseInt(part, 10));
  if (major === undefined || Number.isNaN(major)) return false;
  if (major < 10) return true;
  if (major > 10) return false;

  return build !== undefined && !Number.isNaN(build) && build < MIN_VT_WINDOWS_BUILD;
}

/**
 * Detector that reuses chalk's stdout colour detection
 */
export class ChalkCapabilityDetector implements TerminalCapabilityDetector {
  private readonly colorSupport: typeof supportsColor;
  private readonly platform: NodeJS.Platform;
  private readonly release: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ChalkCapabilityDetectorOptions = {}) {
    this.colorSupport = options.colorSupport ?? supportsColor;
    this.platform = options.platform ?? process.platform;
    this.release = options.release ?? os.release();
    this.env = options.env ?? process.env;
  }

  detect(): TerminalCapabilities {
    return {
      supportsAnsi: this.colorSupport !== false && this.colorSupport.hasBasic,
      legacyConsole: isLegacyWindowsConsole(this.platform, this.release, this.env),
    };
  }
}
