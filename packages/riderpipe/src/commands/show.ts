import { Command } from 'commander';
import chalk from 'chalk';
import { daysInStage } from '../analytics.js';
import { formatRiderDetail } from '../format.js';
import { STAGE_LABELS } from '../stages.js';
import { fail, isJson, openSession, printJson } from './shared.js';

export function showCmd(program: Command): void {
  program
    .command('show <rider>')
    .description('Show one rider by email, key prefix or full name')
    .action(async (query: string) => {
      try {
        const session = await openSession(program);
        const rider = session.desk.get(query);
        if (isJson(program)) { printJson(rider); return; }
        console.log(formatRiderDetail(rider));
        const days = daysInStage(rider, new Date());
        if (days !== null) console.log(`\n  ${chalk.dim(`${days} days in ${STAGE_LABELS[rider.stage]}`)}`);
      } catch (e) {
        fail(e);
      }
    });
}
