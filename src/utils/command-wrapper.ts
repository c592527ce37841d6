import chalk from 'chalk';
import { UserError, SystemError } from '../errors/index.js';

/**
 * Wraps command functions with consistent error handling.
 *
 * Handles:
 * - UserError: configuration and precondition errors (exit code 1)
 * - SystemError: tool and partial failures (exit code 2)
 * - Error: Generic errors (exit code 1)
 *
 * Usage:
 * ```typescript
 * program
 *   .command('backup')
 *   .action(wrapCommand(async (options: BackupOptions) => {
 *     await backupCommand(options);
 *   }));
 * ```
 */
export function wrapCommand<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      process.exitCode = reportError(error);
    }
  };
}

/**
 * Print an error the way every command does and return its exit code.
 */
export function reportError(error: unknown): number {
  if (error instanceof UserError || error instanceof SystemError) {
    console.error(chalk.red('✗'), error.message);
    if (error.hint) {
      console.error(chalk.dim(`\n${error.hint}`));
    }
    return error instanceof UserError ? 1 : 2;
  }
  if (error instanceof Error) {
    console.error(chalk.red('✗'), error.message);
    return 1;
  }
  console.error(chalk.red('✗'), 'An unknown error occurred');
  return 1;
}
