import { z } from 'zod';
import { resolveApiKey, resolveApiUrl, resolveBaseId, resolveTable } from './auth';

export type FieldValue = string | number | boolean | string[] | null;
export type RecordFields = Record<string, FieldValue>;

const fieldValueSchema: z.ZodType<FieldValue> = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.array(z.string()),
  z.null(),
]);

const recordSchema = z.object({
  id: z.string(),
  createdTime: z.string().optional(),
  // Attachment, lookup and collaborator cells are dropped rather than failing the page.
  fields: z.record(z.unknown()).transform((raw) => {
    const fields: RecordFields = {};
    for (const [name, value] of Object.entries(raw)) {
      const parsed = fieldValueSchema.safeParse(value);
      if (parsed.success) fields[name] = parsed.data;
    }
    return fields;
  }),
});

const pageSchema = z.object({
  records: z.array(recordSchema),
  offset: z.string().optional(),
});

export type RemoteRecord = z.infer<typeof recordSchema>;

export interface UpsertResult {
  id: string;
  action: 'created' | 'updated';
  droppedFields: string[];
}

export class RecordsApiError extends Error {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(`API error ${status}: ${message}`);
    this.name = 'RecordsApiError';
  }

  /** Name of the field the table rejected, when the error is an unknown-field 422. */
  get unknownField(): string | null {
    if (this.status !== 422) return null;
    const match = /Unknown field name: "(.*?)"/.exec(this.message);
    return match ? match[1] : null;
  }
}

export type ConnectionCheck = { ok: true } | { ok: false; error: string };

export interface RecordsClientOptions {
  apiKey?: string;
  baseId?: string;
  table?: string;
  apiUrl?: string;
}

const MAX_UPSERT_ATTEMPTS = 5;

/** Quote a value for use inside a filterByFormula string literal. */
export function formulaString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function errorMessage(body: unknown, fallback: string): string {
  if (body && typeof body === 'object' && 'error' in body) {
    const error: unknown = body.error;
    if (typeof error === 'string') return error;
    if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
      return error.message;
    }
  }
  return fallback;
}

export class RecordsClient {
  private baseUrl: string;
  private apiKey: string;
  private tablePath: string;

  constructor(options: RecordsClientOptions = {}) {
    this.apiKey = options.apiKey || resolveApiKey() || '';
    const baseId = options.baseId || resolveBaseId() || '';
    const table = options.table || resolveTable();
    this.baseUrl = (options.apiUrl || resolveApiUrl()).replace(/\/$/, '');
    if (!this.apiKey) throw new Error('No records API key configured. Set RECORDS_API_KEY or records.api_key.');
    if (!baseId) throw new Error('No records base configured. Set RECORDS_BASE_ID or records.base_id.');
    this.tablePath = `/${encodeURIComponent(baseId)}/${encodeURIComponent(table)}`;
  }

  private async request(method: string, path: string, body?: unknown): Promise<unknown> {
    const url = `${this.baseUrl}${this.tablePath}${path}`;
    const res = await fetch(url, {
      method,
      headers: {
        'Authorization': `Bearer ${this.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });
    if (!res.ok) {
      const err: unknown = await res.json().catch(() => ({ error: res.statusText }));
      throw new RecordsApiError(res.status, errorMessage(err, res.statusText));
    }
    return res.json();
  }

  async listRecords(): Promise<RemoteRecord[]> {
    const all: RemoteRecord[] = [];
    let offset: string | undefined;
    do {
      const params = new URLSearchParams({ pageSize: '100' });
      if (offset) params.set('offset', offset);
      const page = pageSchema.parse(await this.request('GET', `?${params.toString()}`));
      all.push(...page.records);
      offset = page.offset;
    } while (offset);
    return all;
  }

  async findRecord(formula: string): Promise<RemoteRecord | null> {
    const params = new URLSearchParams({ filterByFormula: formula, maxRecords: '1' });
    const page = pageSchema.parse(await this.request('GET', `?${params.toString()}`));
    return page.records[0] ?? null;
  }

  async createRecord(fields: RecordFields): Promise<RemoteRecord> {
    return recordSchema.parse(await this.request('POST', '', { fields, typecast: true }));
  }

  async updateRecord(id: string, fields: RecordFields): Promise<RemoteRecord> {
    return recordSchema.parse(await this.request('PATCH', `/${encodeURIComponent(id)}`, { fields, typecast: true }));
  }

  /**
   * Match by `Email` (a value without an `@` is never searched or written), then by
   * `Full Name`, and update the match or create a new record. Fields the table
   * reports as unknown are removed and the write retried.
   */
  async upsertRecord(input: RecordFields): Promise<UpsertResult> {
    const fields: RecordFields = {};
    for (const [name, value] of Object.entries(input)) {
      if (value === null) continue;
      if (name === 'Email' && typeof value === 'string' && !value.includes('@')) continue;
      fields[name] = value;
    }
    const first = typeof fields['First Name'] === 'string' ? fields['First Name'] : '';
    const last = typeof fields['Last Name'] === 'string' ? fields['Last Name'] : '';
    if (!fields['Full Name'] && first && last) fields['Full Name'] = `${first} ${last}`.trim();

    const email = typeof fields.Email === 'string' ? fields.Email : '';
    const fullName = typeof fields['Full Name'] === 'string' ? fields['Full Name'] : '';
    if (!email && !fullName) throw new Error('Cannot upsert a record without Email or Full Name.');

    const droppedFields: string[] = [];
    for (let attempt = 1; ; attempt++) {
      try {
        let existing: RemoteRecord | null = null;
        if (email) existing = await this.findRecord(`{Email} = ${formulaString(email)}`);
        if (!existing && fullName) existing = await this.findRecord(`{Full Name} = ${formulaString(fullName)}`);
        if (existing) {
          await this.updateRecord(existing.id, fields);
          return { id: existing.id, action: 'updated', droppedFields };
        }
        const created = await this.createRecord(fields);
        return { id: created.id, action: 'created', droppedFields };
      } catch (e) {
        const bad = e instanceof RecordsApiError ? e.unknownField : null;
        if (!bad || !(bad in fields) || attempt >= MAX_UPSERT_ATTEMPTS) throw e;
        console.warn(`[records] table rejected field "${bad}", retrying without it`);
        delete fields[bad];
        droppedFields.push(bad);
      }
    }
  }

  /** Read a single record to confirm the key, base and table are usable. */
  async testConnection(): Promise<ConnectionCheck> {
    try {
      pageSchema.parse(await this.request('GET', '?maxRecords=1'));
      return { ok: true };
    } catch (e) {
      return { ok: false, error: e instanceof Error ? e.message : String(e) };
    }
  }
}
