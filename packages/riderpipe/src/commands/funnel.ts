import { Command } from 'commander';
import chalk from 'chalk';
import { funnel } from '../analytics.js';
import { STAGE_LABELS } from '../stages.js';
import { fail, isJson, openSession, printJson } from './shared.js';

export function funnelCmd(program: Command): void {
  program
    .command('funnel')
    .description('Riders reaching each stage of the funnel')
    .action(async () => {
      const session = await openSession(program).catch(fail);
      const steps = funnel(session.registry.all());
      if (isJson(program)) { printJson(steps); return; }

      console.log(chalk.bold('\nFunnel:'));
      for (const step of steps) {
        const bar = '█'.repeat(Math.max(1, Math.round(step.pct / 5)));
        const label = STAGE_LABELS[step.stage].padEnd(40);
        console.log(`  ${label} ${String(step.reached).padStart(4)} (${String(step.pct).padStart(3)}%)  ${chalk.dim(bar)}  ${chalk.dim(`${step.current} now`)}`);
      }
      console.log();
    });
}
