import { Command } from 'commander';
import chalk from 'chalk';
import { recordsClientFor } from '../sources.js';
import { ensureDir, loadConfig, storePaths } from '../store.js';
import { pushAll, pushRider } from '../sync.js';
import { cliLogger, describeSync, fail, isJson, openSession, printJson } from './shared.js';

const NOT_CONFIGURED = 'No records table configured. Set records.api_key and records.base_id.';

async function checkConnection(program: Command): Promise<void> {
  const paths = storePaths();
  ensureDir(paths.dir);
  const client = recordsClientFor(loadConfig(paths), cliLogger(Boolean(program.opts().verbose)));
  if (!client) {
    console.error(chalk.red(NOT_CONFIGURED));
    process.exit(1);
  }
  const check = await client.testConnection();
  if (isJson(program)) { printJson(check); return; }
  if (check.ok) console.log(chalk.green('✓ Records table reachable'));
  else {
    console.error(chalk.red(`Records table unreachable: ${check.error}`));
    process.exit(1);
  }
}

export function pushCmd(program: Command): void {
  program
    .command('push [rider]')
    .description('Write reconciled riders back to the records table')
    .option('--check', 'only check that the records table is reachable')
    .action(async (query: string | undefined, opts: { check?: boolean }) => {
      try {
        if (opts.check) { await checkConnection(program); return; }
        const session = await openSession(program);
        if (!session.records) {
          console.error(chalk.red(NOT_CONFIGURED));
          process.exit(1);
        }
        if (query) {
          const sync = await pushRider(session.records, session.desk.get(query));
          if (isJson(program)) { printJson(sync); return; }
          console.log(`${sync.key}${describeSync(sync)}`);
          return;
        }
        const result = await pushAll(session.records, session.registry.all());
        if (isJson(program)) { printJson(result); return; }
        console.log(chalk.green(`✓ Pushed ${result.pushed} riders`));
        for (const failure of result.failed) console.log(chalk.yellow(`  ${failure.key}${describeSync(failure)}`));
      } catch (e) {
        fail(e);
      }
    });
}
