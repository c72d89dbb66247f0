#!/usr/bin/env tsx
import { Command } from 'commander';
import { registerCommands } from './commands/index.js';

const program = new Command();
program
  .name('riderpipe')
  .description('Reconcile rider funnel exports into one pipeline.')
  .version('0.1.0')
  .option('--json', 'output as JSON')
  .option('-v, --verbose', 'log pipeline progress');

registerCommands(program);
program.parseAsync().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
