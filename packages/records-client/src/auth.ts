import { loadRecordsConfig } from './config';

export const DEFAULT_API_URL = 'https://api.airtable.com/v0';
export const DEFAULT_TABLE = 'Riders';

export function resolveApiKey(): string | null {
  // 1. Env var
  if (process.env.RECORDS_API_KEY) return process.env.RECORDS_API_KEY;
  // 2. Config file
  return loadRecordsConfig().api_key || null;
}

export function resolveBaseId(): string | null {
  if (process.env.RECORDS_BASE_ID) return process.env.RECORDS_BASE_ID;
  return loadRecordsConfig().base_id || null;
}

export function resolveApiUrl(): string {
  if (process.env.RECORDS_API_URL) return process.env.RECORDS_API_URL;
  return loadRecordsConfig().api_url || DEFAULT_API_URL;
}

export function resolveTable(): string {
  if (process.env.RECORDS_TABLE) return process.env.RECORDS_TABLE;
  return loadRecordsConfig().table || DEFAULT_TABLE;
}
