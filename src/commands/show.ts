import chalk from 'chalk';
import Table from 'cli-table3';
import { formatDistanceToNow } from 'date-fns';
import { LATEST_ALIAS } from '../config/constants.js';
import { formatDuration } from '../utils/helpers.js';
import { formatDate } from '../utils/time.js';
import { parseSnapshotId } from '../utils/snapshot-id.js';
import { createOrchestrator, loadSettings, type GlobalOptions } from './context.js';

export interface ShowCommandOptions extends GlobalOptions {
  region?: string;
}

export async function showCommand(options: ShowCommandOptions) {
  const start = Date.now();
  const settings = await loadSettings(options);
  const { bucket, points } = await createOrchestrator(settings).show(options.region);

  console.log();
  console.log(`Available restore points in ${chalk.bold(`s3://${bucket}`)}:`);
  console.log();

  if (points.length === 0) {
    console.log(chalk.dim('No restore points found'));
    console.log();
    console.log(chalk.dim(`Execution finished in ${formatDuration(Date.now() - start)}`));
    console.log();
    return;
  }

  const table = new Table({
    head: ['Restore point', 'Created', 'Age'].map(h => chalk.bold(h)),
    style: {
      head: [],
      border: ['dim'],
    },
  });

  for (const point of points) {
    const created = parseSnapshotId(point);
    if (created) {
      table.push([point, formatDate(created), formatDistanceToNow(created, { addSuffix: true })]);
    } else if (point === LATEST_ALIAS) {
      table.push([chalk.cyan(point), chalk.dim('alias of the newest snapshot'), chalk.dim('-')]);
    } else {
      table.push([chalk.yellow(point), chalk.dim('unrecognized'), chalk.dim('-')]);
    }
  }

  console.log(table.toString());
  console.log();
  console.log(chalk.dim(`Execution finished in ${formatDuration(Date.now() - start)}`));
  console.log();
}
