import { Command } from 'commander';
import chalk from 'chalk';
import { dailyMetrics } from '../analytics.js';
import { parseDate } from '../dates.js';
import { fail, isJson, openSession, printJson } from './shared.js';

export function todayCmd(program: Command): void {
  program
    .command('today')
    .description('Milestones reached today, or on --date')
    .option('--date <date>', 'day to report (YYYY-MM-DD)')
    .action(async (opts: { date?: string }) => {
      const day = opts.date ? parseDate(opts.date) : new Date();
      if (!day) {
        console.error(chalk.red(`Invalid date: ${opts.date}`));
        process.exit(1);
      }
      const session = await openSession(program).catch(fail);
      const metrics = dailyMetrics(session.registry.all(), day);
      if (isJson(program)) { printJson(metrics); return; }

      console.log(chalk.bold(`\n${metrics.date}:`));
      console.log(`  Outreach sent    ${metrics.outreachSent}`);
      console.log(`  Registered       ${metrics.newRegistered}`);
      console.log(`  Day 1 completed  ${metrics.day1Completed}`);
      console.log(`  Day 2 completed  ${metrics.day2Completed}`);
      console.log(`  Calls booked     ${metrics.callsBooked}`);
      console.log(`  Sales closed     ${chalk.green(String(metrics.salesClosed))}`);
      console.log();
    });
}
