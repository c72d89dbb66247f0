import { Command } from 'commander';
import { fullName } from '../registry.js';
import { describeSync, fail, isJson, openSession, printJson } from './shared.js';

export function followUpCmd(program: Command): void {
  program
    .command('follow-up <rider> <date>')
    .description('Set follow-up date')
    .action(async (query: string, date: string) => {
      try {
        const session = await openSession(program);
        const { rider, sync } = await session.desk.setFollowUp(query, date);
        if (isJson(program)) { printJson({ rider, sync }); return; }
        console.log(`Follow-up set for ${fullName(rider) || rider.key}: ${rider.followUpDate?.slice(0, 10)}${describeSync(sync)}`);
      } catch (e) {
        fail(e);
      }
    });
}
