import chalk from 'chalk';
import { ProvisionError } from '../errors.js';

/** Exit code for an error escaping a command: 3 when nothing ran because of configuration, else 1 */
export function exitCodeFor(err: unknown): 1 | 3 {
  return err instanceof ProvisionError && err.isConfigurationError ? 3 : 1;
}

/**
 * Wrap a CLI command handler with centralized error handling.
 * Catches all errors and prints user-friendly output.
 */
export function withErrorHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof ProvisionError) {
        console.error(chalk.red(`✗ ${err.message}`));
        if (err.hint) {
          console.error(chalk.dim(`  ${err.hint}`));
        }
      } else if (err instanceof Error) {
        console.error(chalk.red(`✗ ${err.message}`));
      } else {
        console.error(chalk.red('✗ An unexpected error occurred'));
      }
      process.exit(exitCodeFor(err));
    }
  };
}
