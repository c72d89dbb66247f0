import { Command } from 'commander';
import chalk from 'chalk';
import { calculateTargets, forecastRevenue, funnelPosition, type ActivityTargets } from '../analytics.js';
import { fail, isJson, openSession, printJson } from './shared.js';

const money = (n: number): string => `£${Math.round(n).toLocaleString('en-GB')}`;

const ROWS: ReadonlyArray<[keyof ActivityTargets, string]> = [
  ['sales', 'Sales'],
  ['strategyCalls', 'Strategy calls'],
  ['day2Completions', 'Day 2 completions'],
  ['day1Completions', 'Day 1 completions'],
  ['registrations', 'Registrations'],
  ['outreach', 'Outreach'],
];

export function targetsCmd(program: Command): void {
  program
    .command('targets')
    .description('Activity needed to hit the revenue target, and the current forecast')
    .action(async () => {
      const session = await openSession(program).catch(fail);
      const { targets, conversion_rates: rates } = session.config;
      const plan = calculateTargets(targets, rates);
      const position = funnelPosition(session.registry.all());
      const forecast = forecastRevenue(position, targets.programme_price, rates);
      if (isJson(program)) { printJson({ targets: plan, position, forecast }); return; }

      console.log(chalk.bold(`\nTargets for ${money(plan.monthly.revenue)} a month:`));
      console.log(chalk.dim(`  ${''.padEnd(20)}${'Month'.padStart(8)}${'Week'.padStart(8)}`));
      for (const [key, label] of ROWS) {
        console.log(`  ${label.padEnd(20)}${String(plan.monthly[key]).padStart(8)}${String(plan.weekly[key]).padStart(8)}`);
      }
      console.log(`  Outreach per day ${chalk.cyan(String(plan.dailyOutreach))}`);

      console.log(chalk.bold('\nForecast from the current funnel:'));
      console.log(`  ${position.outreach} in outreach, ${position.registered} registered, ${position.day1} at Day 1, ${position.day2} at Day 2, ${position.calls} calls booked`);
      console.log(`  Expected sales ${forecast.sales.toFixed(1)}, revenue ${chalk.green(money(forecast.revenue))}`);
      console.log();
    });
}
