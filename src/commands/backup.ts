import chalk from 'chalk';
import { PartialFailureError } from '../errors/index.js';
import { formatBytes, formatDuration } from '../utils/helpers.js';
import { createOrchestrator, loadSettings, type GlobalOptions } from './context.js';

export async function backupCommand(options: GlobalOptions) {
  const start = Date.now();
  const settings = await loadSettings(options);

  console.log();
  console.log(`Backing up ${chalk.bold(settings.serviceName)} to ${chalk.bold(settings.environment)} storage...`);
  console.log();

  const report = await createOrchestrator(settings).backup();

  console.log();
  console.log('Details:');
  console.log(`  Snapshot:  ${chalk.dim(report.bundle.id)}`);
  console.log(`  Size:      ${formatBytes(report.bundle.sizeBytes)}`);
  console.log(`  Databases: ${report.bundle.databases.length > 0 ? report.bundle.databases.join(', ') : chalk.dim('-')}`);
  console.log(`  Paths:     ${report.bundle.paths.length > 0 ? report.bundle.paths.join(', ') : chalk.dim('-')}`);
  for (const region of report.regions) {
    const status = region.ok ? chalk.green('published') : chalk.red(`failed (${region.failedStep})`);
    console.log(`  ${region.label}: s3://${region.bucket}/${report.bundle.id}/ ${status}`);
  }
  for (const pruned of report.pruned) {
    if (pruned.deleted.length > 0) {
      console.log(`  ${pruned.label}: removed ${pruned.deleted.length} expired snapshot(s)`);
    }
  }
  console.log();
  console.log(chalk.dim(`Execution finished in ${formatDuration(Date.now() - start)}`));
  console.log();

  const failed = report.regions.filter(region => !region.ok);
  if (failed.length > 0) {
    throw new PartialFailureError(
      `Backup ${report.bundle.id} was not published to every region:`,
      failed.map(region => `${region.label}: ${region.error ?? 'unknown error'}`),
      'Published regions are complete; re-run the backup to retry the others'
    );
  }

  console.log(chalk.green('✓'), 'Backup completed successfully');
  console.log();
}
