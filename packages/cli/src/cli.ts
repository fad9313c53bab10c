/**
 * CLI definition using Commander.js
 */

import { Command, InvalidArgumentError } from 'commander';

import type { CliOptions } from './config/schema.js';
import { withErrorHandling } from './errors/index.js';

export const VERSION = '0.1.0';

/**
 * State descriptions for help text
 */
const STATE_HELP = `Progress state:
    hidden        - Remove the progress indicator
    default       - Normal progress [default]
    error         - Error state (usually red)
    indeterminate - Busy indicator without a percentage
    warning       - Warning state (usually yellow)`;

const RUN_HELP = `Runs <command> with DEPOTDOWNLOADER_PROGRESS_FILE pointing at a temporary
file, prints every progress change, and stops the command once it reports 100%.`;

/**
 * Parse a non-negative integer option value
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/**
 * Options shared by every command
 */
function addCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Path to config file')
    .option('--atomic', 'Write the progress file through a temp file and rename')
    .option('--debug', 'Print swallowed reporter failures to stderr')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)');
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('depot-progress')
    .description(
      'Report download progress to the terminal (OSC 9;4) and to a JSON progress file',
    )
    .version(VERSION)
    .enablePositionalOptions();

  addCommonOptions(
    program
      .command('report')
      .description('Emit a single progress report')
      .argument('[downloaded]', 'Bytes downloaded so far', parseInteger)
      .argument('[total]', 'Total bytes', parseInteger)
      .option('-s, --state <state>', STATE_HELP)
      .option('-p, --percent <n>', 'Explicit percentage (0-255)', parseInteger),
  ).action(
    withErrorHandling(
      async (
        downloaded: number | undefined,
        total: number | undefined,
        options: Record<string, unknown>,
      ) => {
        const { reportCommand } = await import('./commands/report.js');
        await reportCommand(downloaded, total, parseCliOptions(options));
      },
    ),
  );

  addCommonOptions(
    program
      .command('simulate')
      .description('Simulate a download and report its progress')
      .option('--total <bytes>', 'Simulated download size in bytes', parseInteger)
      .option('--chunk <bytes>', 'Bytes received per step', parseInteger)
      .option('--delay <ms>', 'Delay between steps', parseInteger),
  ).action(
    withErrorHandling(async (options: Record<string, unknown>) => {
      const { simulateCommand } = await import('./commands/simulate.js');
      await simulateCommand(parseCliOptions(options));
    }),
  );

  addCommonOptions(
    program
      .command('watch')
      .description('Poll a progress file and display it until it reports 100%')
      .argument('<file>', 'Progress file to watch')
      .option('-i, --interval <ms>', 'Poll interval', parseInteger)
      .option('-t, --timeout <ms>', 'Give up after this long', parseInteger),
  ).action(
    withErrorHandling(async (file: string, options: Record<string, unknown>) => {
      const { watchCommand } = await import('./commands/watch.js');
      await watchCommand(file, parseCliOptions(options));
    }),
  );

  addCommonOptions(
    program
      .command('run')
      .description(RUN_HELP)
      .argument('<command>', 'Downloader executable')
      .argument('[args...]', 'Arguments passed to the downloader')
      .option('-i, --interval <ms>', 'Poll interval', parseInteger)
      .option('-t, --timeout <ms>', 'Stop the downloader after this long', parseInteger)
      .passThroughOptions(),
  ).action(
    withErrorHandling(
      async (command: string, args: string[], options: Record<string, unknown>) => {
        const { runCommand } = await import('./commands/run.js');
        await runCommand(command, args, parseCliOptions(options));
      },
    ),
  );

  return program;
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function numberOption(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function booleanOption(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const config = stringOption(options['config']);
  if (config !== undefined) result.config = config;
  const state = stringOption(options['state']);
  if (state !== undefined) result.state = state;

  const numeric = ['percent', 'interval', 'timeout', 'total', 'chunk', 'delay'] as const;
  for (const key of numeric) {
    const value = numberOption(options[key]);
    if (value !== undefined) result[key] = value;
  }

  const flags = ['debug', 'atomic', 'showConfig'] as const;
  for (const key of flags) {
    const value = booleanOption(options[key]);
    if (value !== undefined) result[key] = value;
  }

  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (options['color'] === false) result.noColor = true;

  return result;
}
