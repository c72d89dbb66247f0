import { Command } from 'commander';
import chalk from 'chalk';
import { dueFollowUps } from '../analytics.js';
import { formatRiderRow } from '../format.js';
import { fail, isJson, openSession, printJson } from './shared.js';

export function dueCmd(program: Command): void {
  program
    .command('due')
    .description('Riders with follow-ups due today or overdue')
    .action(async () => {
      const session = await openSession(program).catch(fail);
      const due = dueFollowUps(session.registry.all(), new Date());
      if (isJson(program)) { printJson(due); return; }
      if (due.length === 0) { console.log('No follow-ups due.'); return; }
      for (const r of due) console.log(`  ${chalk.dim(r.followUpDate?.slice(0, 10) ?? '')}  ${formatRiderRow(r)}`);
    });
}
