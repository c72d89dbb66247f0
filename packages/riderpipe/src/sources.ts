import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { RecordsClient } from '@pitwall/records-client';
import { DEFAULT_FEED_FILES, DEFAULT_HEADER_ROWS, resolved, type FeedConfig, type PitwallConfig } from './config.js';
import { normalizeRow } from './fields.js';
import { FEED_KEYS, type FeedKey } from './ingest/index.js';
import type { Logger, Row } from './types.js';

export interface FeedSource {
  key: string;
  name: string;
  fetch(): Promise<Row[]>;
}

function isRow(value: unknown): value is Row {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function toRows(records: unknown): Row[] {
  if (!Array.isArray(records)) throw new Error('expected a list of rows');
  return records.filter(isRow);
}

export function parseCsv(text: string, headerRow = 1): Row[] {
  const records: unknown = parse(text, {
    columns: true,
    bom: true,
    from_line: headerRow,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return toRows(records);
}

export class CsvFileSource implements FeedSource {
  readonly name: string;

  constructor(
    readonly key: string,
    private file: string,
    private headerRow = 1,
  ) {
    this.name = path.basename(file);
  }

  async fetch(): Promise<Row[]> {
    const text = await fs.promises.readFile(this.file, 'utf-8');
    return parseCsv(text, this.headerRow);
  }
}

const valuesSchema = z.object({
  values: z.array(z.array(z.union([z.string(), z.number(), z.boolean()]))).default([]),
});

/** Convert a sheet's value grid into rows keyed by its header line. Short rows are padded. */
export function gridToRows(grid: Array<Array<string | number | boolean>>, headerRow = 1): Row[] {
  const header = (grid[headerRow - 1] ?? []).map((cell) => String(cell));
  return grid.slice(headerRow).map((line) => {
    const row: Row = {};
    header.forEach((column, i) => {
      if (column) row[column] = line[i] ?? '';
    });
    return row;
  });
}

export class SheetFeedSource implements FeedSource {
  readonly name: string;

  constructor(
    readonly key: string,
    private spreadsheetId: string,
    private range: string,
    private accessToken: string,
    private headerRow = 1,
  ) {
    this.name = `sheet:${spreadsheetId}/${range}`;
  }

  async fetch(): Promise<Row[]> {
    const url = `https://sheets.googleapis.com/v4/spreadsheets/${encodeURIComponent(this.spreadsheetId)}/values/${encodeURIComponent(this.range)}`;
    const res = await fetch(url, { headers: { Authorization: `Bearer ${this.accessToken}` } });
    if (!res.ok) throw new Error(`Sheets API error ${res.status}: ${res.statusText}`);
    const body = valuesSchema.parse(await res.json());
    return gridToRows(body.values, this.headerRow);
  }
}

export class MasterFeedSource implements FeedSource {
  readonly key = 'master_records';
  readonly name = 'records table';

  constructor(private client: RecordsClient) {}

  async fetch(): Promise<Row[]> {
    const records = await this.client.listRecords();
    return records.map((record) => ({ ...record.fields }));
  }
}

function feedSource(key: FeedKey, feed: FeedConfig, config: PitwallConfig, feedsDir: string, logger: Logger): FeedSource | null {
  const headerRow = feed.header_row > 1 ? feed.header_row : DEFAULT_HEADER_ROWS[key] ?? 1;
  if (feed.sheet) {
    const token = resolved(config.sheets.access_token);
    if (!token) {
      logger.warn(`[sources] ${key}: sheet configured but sheets.access_token is missing`);
      return null;
    }
    return new SheetFeedSource(key, feed.sheet, feed.range ?? 'Sheet1', token, headerRow);
  }
  const file = feed.file ?? DEFAULT_FEED_FILES[key];
  if (!file) return null;
  const full = path.resolve(feedsDir, file);
  return fs.existsSync(full) ? new CsvFileSource(key, full, headerRow) : null;
}

export interface ResolveOptions {
  /** Project root; `feeds_dir` resolves against it. */
  baseDir: string;
  editLog: string;
  logger: Logger;
  /** Overrides the records client built from config. */
  recordsClient?: RecordsClient | null;
}

/**
 * Work out which sources this run reads: configured or default files and
 * sheets, the edit log, every other CSV in the feeds directory for the
 * social scan, and the records table when credentials are configured.
 */
export function resolveSources(config: PitwallConfig, opts: ResolveOptions): FeedSource[] {
  const feedsDir = path.resolve(opts.baseDir, config.feeds_dir);
  const sources: FeedSource[] = [];
  const claimed = new Set<string>();

  for (const key of FEED_KEYS) {
    if (key === 'manual_edits' || key === 'social_scan' || key === 'master_records') continue;
    const feed: FeedConfig = config.feeds[key] ?? { header_row: 1, enabled: true };
    const file = feed.sheet ? undefined : feed.file ?? DEFAULT_FEED_FILES[key];
    // A known feed's file is never social-scanned, even when the feed is disabled.
    if (file) claimed.add(path.basename(file));
    if (!feed.enabled) continue;
    const source = feedSource(key, feed, config, feedsDir, opts.logger);
    if (source) sources.push(source);
  }

  if (fs.existsSync(opts.editLog)) sources.push(new CsvFileSource('manual_edits', opts.editLog));

  if (config.social_scan && fs.existsSync(feedsDir)) {
    for (const file of fs.readdirSync(feedsDir).sort()) {
      if (!file.toLowerCase().endsWith('.csv') || claimed.has(file)) continue;
      sources.push(new CsvFileSource('social_scan', path.join(feedsDir, file)));
    }
  }

  const client = opts.recordsClient === undefined ? recordsClientFor(config, opts.logger) : opts.recordsClient;
  if (client) sources.push(new MasterFeedSource(client));
  return sources;
}

export function recordsClientFor(config: PitwallConfig, logger: Logger): RecordsClient | null {
  const { api_key, base_id, table, api_url } = config.records;
  const apiKey = resolved(api_key) || process.env.RECORDS_API_KEY;
  const baseId = resolved(base_id) || process.env.RECORDS_BASE_ID;
  if (!apiKey || !baseId) return null;
  try {
    return new RecordsClient({ apiKey, baseId, table, apiUrl: resolved(api_url) });
  } catch (e) {
    logger.warn(`[sources] records table disabled: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }
}

const RACE_NAME_COLUMNS = ['name', 'rider', 'rider name', 'full name', 'competitor'];

/**
 * Names from a race results list: one per line, or one CSV column. Without an
 * explicit column the first name-like header is used, else the first column.
 */
export function raceNames(text: string, opts: { csv: boolean; column?: string }): string[] {
  if (!opts.csv) return text.split(/\r?\n/).map((line) => line.trim()).filter(Boolean);
  const rows = parseCsv(text).map(normalizeRow);
  const header = Object.keys(rows[0] ?? {});
  const wanted = opts.column?.trim().toLowerCase();
  if (wanted && !header.includes(wanted)) throw new Error(`No column "${opts.column}" in the results file`);
  const column = wanted ?? RACE_NAME_COLUMNS.find((name) => header.includes(name)) ?? header[0];
  if (!column) return [];
  return rows.map((row) => (row[column] ?? '').trim()).filter(Boolean);
}

export async function readRaceNames(file: string, column?: string): Promise<string[]> {
  const text = await fs.promises.readFile(file, 'utf-8');
  return raceNames(text, { csv: file.toLowerCase().endsWith('.csv'), column });
}
