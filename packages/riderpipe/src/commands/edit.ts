import { Command } from 'commander';
import type { EditField } from '../edits.js';
import { EditRejectedError } from '../errors.js';
import { fullName } from '../registry.js';
import type { DeskResult } from '../desk.js';
import { describeSync, fail, isJson, openSession, printJson } from './shared.js';

interface EditOptions {
  firstName?: string;
  lastName?: string;
  phone?: string;
  championship?: string;
  facebook?: string;
  instagram?: string;
  linkedin?: string;
  tags?: string;
  notes?: string;
}

const OPTION_FIELDS: ReadonlyArray<[keyof EditOptions, EditField]> = [
  ['firstName', 'first_name'],
  ['lastName', 'last_name'],
  ['phone', 'phone'],
  ['championship', 'championship'],
  ['facebook', 'facebook_url'],
  ['instagram', 'instagram_url'],
  ['linkedin', 'linkedin_url'],
  ['tags', 'tags'],
  ['notes', 'notes'],
];

export function editCmd(program: Command): void {
  program
    .command('edit <rider>')
    .description('Edit rider fields. Pass an empty string to clear a field.')
    .option('--first-name <name>')
    .option('--last-name <name>')
    .option('--phone <phone>')
    .option('--championship <name>')
    .option('--facebook <url>')
    .option('--instagram <url>')
    .option('--linkedin <url>')
    .option('--tags <tags>')
    .option('--notes <notes>', 'replace all notes')
    .action(async (query: string, opts: EditOptions) => {
      try {
        const changes = OPTION_FIELDS.flatMap(([option, field]): Array<[EditField, string]> => {
          const value = opts[option];
          return value === undefined ? [] : [[field, value]];
        });
        if (changes.length === 0) throw new EditRejectedError('nothing to change');

        const session = await openSession(program);
        let result: DeskResult | undefined;
        for (const [field, value] of changes) result = await session.desk.setField(query, field, value);
        if (!result) return;
        if (isJson(program)) { printJson(result); return; }
        console.log(`Updated ${fullName(result.rider) || result.rider.key}${describeSync(result.sync)}`);
      } catch (e) {
        fail(e);
      }
    });
}
