import { Command } from 'commander';
import chalk from 'chalk';
import { fullName } from '../registry.js';
import { describeSync, fail, isJson, openSession, printJson } from './shared.js';

interface AddOptions {
  email?: string;
  first?: string;
  last?: string;
  facebook?: string;
  instagram?: string;
  championship?: string;
  notes?: string;
  followUp?: string;
}

export function addCmd(program: Command): void {
  program
    .command('add')
    .description('Add a rider by hand. Needs an email or a name.')
    .option('--email <email>')
    .option('--first <name>', 'first name')
    .option('--last <name>', 'last name')
    .option('--facebook <url>')
    .option('--instagram <url>')
    .option('--championship <name>')
    .option('--notes <text>')
    .option('--follow-up <date>')
    .action(async (opts: AddOptions) => {
      try {
        const session = await openSession(program);
        const { rider, sync } = await session.desk.addRider({
          email: opts.email,
          firstName: opts.first,
          lastName: opts.last,
          facebookUrl: opts.facebook,
          instagramUrl: opts.instagram,
          championship: opts.championship,
          notes: opts.notes,
          followUpDate: opts.followUp,
        });
        if (isJson(program)) { printJson({ rider, sync }); return; }
        console.log(chalk.green(`✓ ${fullName(rider) || rider.key} (${rider.key})`) + describeSync(sync));
      } catch (e) {
        fail(e);
      }
    });
}
