import { Command } from 'commander';
import chalk from 'chalk';
import { fullName } from '../registry.js';
import { describeSync, fail, isJson, openSession, printJson } from './shared.js';

export function disqualifyCmd(program: Command): void {
  program
    .command('disqualify <rider>')
    .description('Mark a rider as not a fit')
    .requiredOption('--reason <reason>')
    .action(async (query: string, opts: { reason: string }) => {
      try {
        const session = await openSession(program);
        const { rider, sync } = await session.desk.disqualify(query, opts.reason);
        if (isJson(program)) { printJson({ rider, sync }); return; }
        console.log(`${fullName(rider) || rider.key} ${chalk.gray('marked not a fit')}${describeSync(sync)}`);
      } catch (e) {
        fail(e);
      }
    });
}
