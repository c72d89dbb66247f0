import { Command } from 'commander';
import { formatRiderRow } from '../format.js';
import { fullName } from '../registry.js';
import { fail, isJson, openSession, printJson } from './shared.js';

export function searchCmd(program: Command): void {
  program
    .command('search <query>')
    .description('Search riders by name, email, championship, tags or notes')
    .action(async (query: string) => {
      const session = await openSession(program).catch(fail);
      const q = query.toLowerCase();
      const results = session.registry.all().filter((r) =>
        [r.key, fullName(r), r.championship, r.tags, r.notes].some((text) => text?.toLowerCase().includes(q)),
      );
      if (isJson(program)) { printJson(results); return; }
      if (results.length === 0) { console.log('No matches.'); return; }
      for (const r of results) console.log(formatRiderRow(r));
    });
}
