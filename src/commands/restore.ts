import chalk from 'chalk';
import * as prompts from '@clack/prompts';
import { LATEST_ALIAS } from '../config/constants.js';
import { PartialFailureError, UserError } from '../errors/index.js';
import { formatDuration } from '../utils/helpers.js';
import { createOrchestrator, loadSettings, type GlobalOptions } from './context.js';

export interface RestoreCommandOptions extends GlobalOptions {
  date?: string;
  extra?: string;
  region?: string;
  yes?: boolean;
}

export async function restoreCommand(options: RestoreCommandOptions) {
  const start = Date.now();
  const settings = await loadSettings(options);
  const orchestrator = createOrchestrator(settings);

  console.log();
  const point = await orchestrator.locateRestorePoint(options.date ?? LATEST_ALIAS, options.region);
  console.log(`Restoring ${chalk.bold(settings.serviceName)} from ${chalk.bold(point.id)} (s3://${point.bucket})`);
  console.log();

  if (!options.yes) {
    if (!process.stdin.isTTY) {
      throw new UserError(
        'Refusing to restore without confirmation',
        'Pass --yes to restore non-interactively'
      );
    }

    console.log(chalk.yellow('⚠'), 'This replaces the contents of:');
    for (const p of settings.paths) {
      console.log(`  ${chalk.dim('•')} ${p}`);
    }
    console.log(`  ${chalk.dim('•')} ${settings.databases.length > 0 ? `databases ${settings.databases.join(', ')}` : 'every database found in the snapshot'}`);
    console.log();

    const confirm = await prompts.confirm({ message: `Restore ${point.id}?` });
    if (prompts.isCancel(confirm) || !confirm) {
      console.log();
      console.log(chalk.dim('Cancelled'));
      console.log();
      return;
    }
    console.log();
  }

  const report = await orchestrator.restore(point, { hook: options.extra });

  console.log();
  for (const p of report.paths) {
    console.log(`  ${p.restored ? chalk.green('✓') : chalk.yellow('-')} ${p.path}${p.reason ? chalk.dim(` (${p.reason})`) : ''}`);
  }
  for (const db of report.databases) {
    console.log(`  ${db.restored ? chalk.green('✓') : chalk.red('✗')} database ${db.name}`);
  }
  console.log();
  console.log(chalk.dim(`Execution finished in ${formatDuration(Date.now() - start)}`));
  console.log();

  const failed = report.databases.filter(db => !db.restored);
  if (failed.length > 0) {
    throw new PartialFailureError(
      `Restore of ${point.id} is incomplete:`,
      failed.map(db => `${db.name}: ${db.error ?? 'unknown error'}`),
      'Restored paths and databases were kept; fix the cause and restore again'
    );
  }

  console.log(chalk.green('✓'), 'Restore completed successfully');
  console.log();
}
