import { Command } from 'commander';
import { fullName } from '../registry.js';
import { describeSync, fail, isJson, openSession, printJson } from './shared.js';

export function noteCmd(program: Command): void {
  program
    .command('note <rider> <text...>')
    .description('Append a dated note')
    .action(async (query: string, words: string[]) => {
      try {
        const session = await openSession(program);
        const { rider, sync } = await session.desk.addNote(query, words.join(' '));
        if (isJson(program)) { printJson({ rider, sync }); return; }
        console.log(`Note added for ${fullName(rider) || rider.key}${describeSync(sync)}`);
      } catch (e) {
        fail(e);
      }
    });
}
