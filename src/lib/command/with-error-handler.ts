import chalk from 'chalk';
import { UpdaterError, exitCodeFor } from '../errors.js';
import { debug } from '../utils/debug.js';

/**
 * Wrap a CLI command handler so any error ends the process with a
 * one-line message, the error's hint, and its exit code.
 * Stack traces only appear under MAC_UPDATER_DEBUG.
 */
export function withErrorHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof Error) debug('error', err.stack);

      if (err instanceof UpdaterError) {
        console.error(chalk.red(`✗ ${err.message}`));
        if (err.hint) {
          console.error(chalk.dim(`  ${err.hint}`));
        }
        // Config and catalog faults get exit code 3
        process.exit(exitCodeFor(err.code));
      } else if (err instanceof Error) {
        console.error(chalk.red(`✗ ${err.message}`));
      } else {
        console.error(chalk.red('✗ An unexpected error occurred'));
      }
      process.exit(1);
    }
  };
}
