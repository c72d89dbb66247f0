import { Command } from 'commander';
import chalk from 'chalk';
import { formatRiderRow } from '../format.js';
import { resolveStageFilter } from '../stages.js';
import { fail, isJson, openSession, printJson } from './shared.js';

interface ListOptions {
  stage?: string;
  championship?: string;
}

export function listCmd(program: Command): void {
  program
    .command('list')
    .description('List riders')
    .option('--stage <stage>', 'filter by stage (comma-separated list, keys or labels)')
    .option('--championship <name>', 'filter by championship')
    .action(async (opts: ListOptions) => {
      try {
        const session = await openSession(program);
        let riders = session.registry.all();

        if (opts.stage) {
          const filter = resolveStageFilter(opts.stage);
          if (!filter.ok) {
            console.error(chalk.red(`Unknown stage: ${filter.unknown}`));
            process.exit(1);
          }
          riders = riders.filter((r) => filter.stages.includes(r.stage));
        }
        if (opts.championship) {
          const wanted = opts.championship.toLowerCase();
          riders = riders.filter((r) => r.championship?.toLowerCase().includes(wanted));
        }

        if (isJson(program)) { printJson(riders); return; }
        if (riders.length === 0) { console.log('No riders found.'); return; }
        for (const r of riders) console.log(formatRiderRow(r));
      } catch (e) {
        fail(e);
      }
    });
}
