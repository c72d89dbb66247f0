import { Command } from 'commander';
import chalk from 'chalk';
import { processRaceResults } from '../analytics.js';
import { STAGE_LABELS } from '../stages.js';
import { readRaceNames } from '../sources.js';
import { fail, isJson, openSession, printJson } from './shared.js';

interface RaceResultsOptions {
  event: string;
  column?: string;
}

export function raceResultsCmd(program: Command): void {
  program
    .command('race-results <file>')
    .description('Match a race results list to riders and draft opening messages')
    .requiredOption('--event <name>', 'event the results are from')
    .option('--column <name>', 'CSV column holding rider names')
    .action(async (file: string, opts: RaceResultsOptions) => {
      let names: string[];
      try {
        names = await readRaceNames(file, opts.column);
      } catch (e) {
        console.error(chalk.red(`Cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`));
        process.exit(1);
      }
      const session = await openSession(program).catch(fail);
      const results = processRaceResults(session.registry.all(), names, opts.event);
      if (isJson(program)) { printJson(results); return; }

      const matched = results.filter((r) => r.status === 'match_found').length;
      console.log(chalk.bold(`\n${opts.event}: ${matched} known riders, ${results.length - matched} new prospects\n`));
      for (const result of results) {
        const tag = result.stage ? chalk.green(STAGE_LABELS[result.stage]) : chalk.yellow('New');
        console.log(`  ${result.name.padEnd(28)} ${tag}`);
        console.log(chalk.dim(`    ${result.message}`));
      }
      console.log();
    });
}
