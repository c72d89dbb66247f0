import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

export interface RecordsConfig {
  api_url?: string;
  api_key?: string;
  base_id?: string;
  table?: string;
}

const CONFIG_DIR = path.join(os.homedir(), '.pitwall');
const CONFIG_FILE = path.join(CONFIG_DIR, 'records.json');

export function loadRecordsConfig(file: string = CONFIG_FILE): RecordsConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch {
    return {};
  }
  if (raw === null || typeof raw !== 'object') return {};
  const out: RecordsConfig = {};
  for (const key of ['api_url', 'api_key', 'base_id', 'table'] as const) {
    const value: unknown = Reflect.get(raw, key);
    if (typeof value === 'string' && value) out[key] = value;
  }
  return out;
}
