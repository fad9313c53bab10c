/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  InputError,
  ProcessError,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, exitCodeFor, handleError, withErrorHandling } from './handler.js';
