import { Command } from 'commander';
import chalk from 'chalk';
import { stringify } from 'csv-stringify/sync';
import { fullName } from '../registry.js';
import { resolveStageFilter, STAGE_LABELS } from '../stages.js';
import { fail, openSession, printJson } from './shared.js';

export function exportCmd(program: Command): void {
  program
    .command('export')
    .description('Export reconciled riders')
    .option('--csv', 'export as CSV')
    .option('--stage <stage>', 'filter by stage (comma-separated list, keys or labels)')
    .action(async (opts: { csv?: boolean; stage?: string }) => {
      const session = await openSession(program).catch(fail);
      let riders = session.registry.all();
      if (opts.stage) {
        const filter = resolveStageFilter(opts.stage);
        if (!filter.ok) {
          console.error(chalk.red(`Unknown stage: ${filter.unknown}`));
          process.exit(1);
        }
        riders = riders.filter((r) => filter.stages.includes(r.stage));
      }

      if (!opts.csv) { printJson(riders); return; }
      const rows = riders.map((r) => ({
        key: r.key,
        name: fullName(r),
        stage: STAGE_LABELS[r.stage],
        phone: r.phone ?? '',
        championship: r.championship ?? '',
        facebook: r.facebookUrl ?? '',
        instagram: r.instagramUrl ?? '',
        registered: r.milestones.registered ?? '',
        day1: r.milestones.day1Complete ?? '',
        day2: r.milestones.day2Complete ?? '',
        call: r.milestones.callBooked ?? '',
        sale: r.saleValue ?? '',
        followUp: r.followUpDate ?? '',
        tags: r.tags,
      }));
      process.stdout.write(stringify(rows, { header: true }));
    });
}
