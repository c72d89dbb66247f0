import { Command } from 'commander';
import chalk from 'chalk';
import { stalledRiders, type StallKind } from '../analytics.js';
import { formatRiderRow } from '../format.js';
import { fail, isJson, openSession, printJson } from './shared.js';

const HEADINGS: ReadonlyArray<[StallKind, string]> = [
  ['registered_no_day1', 'Registered, no Day 1'],
  ['day1_no_day2', 'Day 1 done, no Day 2'],
  ['day2_no_call', 'Day 2 done, no call booked'],
  ['messaged_no_reply', 'Messaged, no reply'],
];

export function staleCmd(program: Command): void {
  program
    .command('stale')
    .description('Riders stuck in a stage')
    .option('--days <days>', 'stale threshold')
    .action(async (opts: { days?: string }) => {
      const session = await openSession(program).catch(fail);
      const days = Number(opts.days) || session.config.stale.days;
      const stalled = stalledRiders(session.registry.all(), days, new Date());
      if (isJson(program)) { printJson(stalled); return; }

      const groups = HEADINGS.flatMap(([kind, heading]) => (stalled[kind].length ? [{ heading, list: stalled[kind] }] : []));
      if (groups.length === 0) { console.log('No stalled riders.'); return; }
      console.log(`Stalled (>=${days} days):`);
      for (const { heading, list } of groups) {
        console.log(chalk.bold(`\n  ${heading}`));
        for (const { rider, days: d } of list) console.log(`  ${chalk.dim(`${d}d`.padStart(5))}  ${formatRiderRow(rider)}`);
      }
    });
}
