import { Command } from 'commander';
import chalk from 'chalk';
import { revenueMetrics } from '../analytics.js';
import { fail, isJson, openSession, printJson } from './shared.js';

const money = (n: number): string => `£${n.toLocaleString('en-GB')}`;

export function revenueCmd(program: Command): void {
  program
    .command('revenue')
    .description('Revenue against the monthly target')
    .action(async () => {
      const session = await openSession(program).catch(fail);
      const metrics = revenueMetrics(session.registry.all(), session.config.targets);
      if (isJson(program)) { printJson(metrics); return; }

      console.log(chalk.bold('\nRevenue:'));
      console.log(`  Target     ${money(metrics.target).padStart(10)}`);
      console.log(`  Closed     ${chalk.green(money(metrics.actual).padStart(10))}  ${metrics.clients} clients, ${metrics.progressPct}% of target`);
      console.log(`  Pipeline   ${chalk.yellow(money(metrics.pipeline).padStart(10))}  ${metrics.callsBooked} calls booked`);
      console.log();
    });
}
