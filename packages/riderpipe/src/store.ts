import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { stringify } from 'csv-stringify/sync';
import { defaultConfig, parseConfigYaml, type PitwallConfig } from './config.js';
import { EDIT_LOG_COLUMNS, editToRow, type EditEntry } from './edits.js';

export function getDir(): string {
  return path.resolve(process.env.PITWALL_DIR || '.pitwall');
}

export interface StorePaths {
  dir: string;
  /** Project root: feed paths in the config resolve against it. */
  root: string;
  config: string;
  editLog: string;
  templates: string;
}

export function storePaths(dir: string = getDir()): StorePaths {
  return {
    dir,
    root: path.dirname(dir),
    config: path.join(dir, 'config.yaml'),
    editLog: path.join(dir, 'edits.csv'),
    templates: path.join(dir, 'templates'),
  };
}

export function ensureDir(dir: string = getDir()): void {
  if (!fs.existsSync(dir)) {
    throw new Error('Not initialized. Run `riderpipe init` first.');
  }
}

/** Missing config file means defaults. */
export function loadConfig(paths: StorePaths = storePaths()): PitwallConfig {
  if (!fs.existsSync(paths.config)) return defaultConfig();
  return parseConfigYaml(fs.readFileSync(paths.config, 'utf-8'), paths.config);
}

/** Append edits to the log, writing the header when the log is new. Never rewrites earlier lines. */
export function appendEdits(entries: EditEntry[], paths: StorePaths = storePaths()): void {
  if (entries.length === 0) return;
  const fresh = !fs.existsSync(paths.editLog) || fs.statSync(paths.editLog).size === 0;
  const text = stringify(entries.map(editToRow), { header: fresh, columns: [...EDIT_LOG_COLUMNS] });
  fs.mkdirSync(path.dirname(paths.editLog), { recursive: true });
  fs.appendFileSync(paths.editLog, text);
}

const STARTER_CONFIG = {
  feeds_dir: 'feeds',
  social_scan: true,
  feeds: {
    facebook_history: { file: 'Facebook Messenger History.csv', header_row: 2 },
  },
  sheets: { access_token: '${GOOGLE_SHEETS_TOKEN}' },
  records: { api_key: '${RECORDS_API_KEY}', base_id: '${RECORDS_BASE_ID}', table: 'Riders' },
  facebook: { owner_name: '' },
  coach: { name: 'Coach' },
  targets: { monthly_revenue: 15000, programme_price: 4000 },
  stale: { days: 3 },
};

const TEMPLATES: Record<string, string> = {
  'day1-nudge.md': `Hey {{firstName}},

Saw you grabbed the Podium Contenders Blueprint. Day 1 is the 7 Biggest Mistakes assessment and it only takes ten minutes.

Once it's done I'll send over what your score says about your race weekends.

{{coach}}`,
  'day2-nudge.md': `Hey {{firstName}},

Great work on Day 1. Day 2 is the self assessment across the five pillars: mindset, preparation, flow, feedback and sponsorship.

Knock it out before your next session at {{championship}} and we'll see where the time is hiding.

{{coach}}`,
  'strategy-call.md': `Hey {{firstName}},

You've finished both days of the Blueprint, which puts you ahead of most of the grid.

Next step is a short strategy call to map out your season. Want me to send a link?

{{coach}}`,
  'race-weekend.md': `Hey {{firstName}},

How did the weekend go? Keen to hear how the sessions went and what you'd change for next time.

{{coach}}`,
};

export function initStore(dir: string = getDir()): boolean {
  const paths = storePaths(dir);
  if (fs.existsSync(paths.dir)) return false;
  fs.mkdirSync(paths.templates, { recursive: true });
  fs.writeFileSync(paths.config, yaml.dump(STARTER_CONFIG));
  fs.writeFileSync(paths.editLog, `${EDIT_LOG_COLUMNS.join(',')}\n`);
  for (const [file, content] of Object.entries(TEMPLATES)) {
    fs.writeFileSync(path.join(paths.templates, file), content);
  }
  fs.mkdirSync(path.join(paths.root, STARTER_CONFIG.feeds_dir), { recursive: true });
  return true;
}
