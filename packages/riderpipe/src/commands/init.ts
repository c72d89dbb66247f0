import { Command } from 'commander';
import chalk from 'chalk';
import { getDir, initStore, storePaths } from '../store.js';

export function initCmd(program: Command): void {
  program.command('init').description('Initialize .pitwall/ with a starter config, edit log and templates')
    .action(() => {
      const dir = getDir();
      if (!initStore(dir)) {
        console.log(`${dir} already exists.`);
        return;
      }
      const paths = storePaths(dir);
      console.log(chalk.green(`✓ Created ${paths.dir}`));
      console.log(`  Drop feed exports into ${chalk.bold('feeds/')} and run ${chalk.bold('riderpipe load')}.`);
    });
}
