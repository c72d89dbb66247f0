import { Command } from 'commander';
import chalk from 'chalk';
import { hasUsableData, type FeedOutcome } from '../report.js';
import { fail, isJson, openSession, printJson } from './shared.js';

function statusLabel(feed: FeedOutcome): string {
  if (feed.status === 'failed') return chalk.red('failed');
  if (feed.status === 'absent') return chalk.dim('absent');
  return chalk.green('ingested');
}

export function loadCmd(program: Command): void {
  program
    .command('load')
    .description('Reconcile every feed and print the load report')
    .action(async () => {
      const session = await openSession(program).catch(fail);
      const { report } = session;
      if (isJson(program)) { printJson(report); return; }

      console.log(chalk.bold(`\nLoaded ${session.registry.size} riders`));
      for (const feed of report.feeds) {
        const counts = feed.status === 'ingested' ? `${feed.rowsLoaded}/${feed.rowsSeen} rows` : '';
        const error = feed.error ? chalk.dim(` (${feed.error})`) : '';
        console.log(`  ${feed.feed.padEnd(28)} ${statusLabel(feed).padEnd(18)} ${counts.padStart(12)}  ${chalk.dim(feed.source)}${error}`);
      }
      console.log(`\n  Rows: ${report.totalRowsSeen} seen, ${report.rowsLoaded} loaded, ${report.rowsSkipped} skipped`);
      for (const [reason, count] of Object.entries(report.skipReasons)) {
        console.log(`    ${chalk.dim(reason.padEnd(30))} ${count}`);
      }
      if (!hasUsableData(report)) console.log(chalk.yellow('\n  No feed contributed any rows.'));
      console.log();
    });
}
