import { Command } from 'commander';
import { CLI_NAME, LATEST_ALIAS, TOOL_NAME, VERSION } from './config/constants.js';
import { backupCommand } from './commands/backup.js';
import { restoreCommand, type RestoreCommandOptions } from './commands/restore.js';
import { showCommand, type ShowCommandOptions } from './commands/show.js';
import type { GlobalOptions } from './commands/context.js';
import { wrapCommand } from './utils/command-wrapper.js';

/**
 * The commander program with every command registered.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(`${TOOL_NAME}: snapshot service files and databases to S3-compatible storage, and restore them`)
    .version(VERSION);

  // ============================================================================
  // Backup
  // ============================================================================

  program
    .command('backup')
    .description('Create a snapshot, upload it to every region and remove expired ones')
    .requiredOption('--env <env>', 'storage environment (dev or prod)')
    .option('--config <file>', 'config file (default: ./vaultsync.yaml)')
    .action(wrapCommand(async (options: GlobalOptions) => {
      await backupCommand(options);
    }));

  // ============================================================================
  // Restore
  // ============================================================================

  program
    .command('restore')
    .description('Replace local files and databases with a snapshot')
    .requiredOption('--env <env>', 'storage environment (dev or prod)')
    .option('--date <id>', 'restore point to use, as listed by show', LATEST_ALIAS)
    .option('--extra <path>', 'executable to run once everything is restored')
    .option('--region <label>', 'region to restore from (default: primary)')
    .option('-y, --yes', 'do not ask for confirmation')
    .option('--config <file>', 'config file (default: ./vaultsync.yaml)')
    .action(wrapCommand(async (options: RestoreCommandOptions) => {
      await restoreCommand(options);
    }));

  // ============================================================================
  // Show
  // ============================================================================

  program
    .command('show')
    .description('List available restore points')
    .requiredOption('--env <env>', 'storage environment (dev or prod)')
    .option('--region <label>', 'region to list (default: primary)')
    .option('--config <file>', 'config file (default: ./vaultsync.yaml)')
    .action(wrapCommand(async (options: ShowCommandOptions) => {
      await showCommand(options);
    }));

  return program;
}
