import type { Row } from './types.js';

/** A row with lowercased, trimmed header names and text cells. */
export type NormalizedRow = Record<string, string>;

/** Alias table for one feed: logical field name to candidate columns, tried in order. */
export type AliasMap<F extends string> = Record<F, readonly string[]>;

export function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : '';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (Array.isArray(value)) return value.map(cellText).filter(Boolean).join(',');
  return '';
}

export function normalizeRow(row: Row): NormalizedRow {
  const out: NormalizedRow = {};
  for (const [key, value] of Object.entries(row)) {
    const name = key.trim().toLowerCase();
    if (!name) continue;
    // First column wins when two headers collapse to the same name.
    if (name in out && out[name]) continue;
    out[name] = cellText(value);
  }
  return out;
}

export function pick(row: NormalizedRow, aliases: readonly string[]): string {
  for (const alias of aliases) {
    const value = row[alias];
    if (value) return value;
  }
  return '';
}

/** First non-blank value whose column name satisfies `match`. */
export function pickWhere(row: NormalizedRow, match: (column: string) => boolean): string {
  for (const [column, value] of Object.entries(row)) {
    if (value && match(column)) return value;
  }
  return '';
}

const TRUTHY = new Set(['yes', 'y', 'true', '1']);

export function isTruthy(value: string): boolean {
  return TRUTHY.has(value.trim().toLowerCase());
}

/** Parse an amount such as "£4,000" or "$1,250.50". */
export function parseAmount(value: string): number | null {
  const cleaned = value.replace(/[£$€,\s]/g, '');
  if (!cleaned) return null;
  const amount = Number(cleaned);
  return Number.isFinite(amount) ? amount : null;
}

export function parseScore(value: string): number | null {
  if (!value) return null;
  const score = Number(value);
  return Number.isFinite(score) ? score : null;
}

/** Set a field only when the new value is non-blank. */
export function assign<T, K extends keyof T>(target: T, field: K, value: T[K] | '' | null | undefined): void {
  if (value === '' || value === null || value === undefined) return;
  target[field] = value;
}

/** Set a field only when it is currently empty. */
export function fill<T, K extends keyof T>(target: T, field: K, value: T[K] | '' | null | undefined): void {
  const current = target[field];
  if (current !== null && current !== undefined && current !== '') return;
  assign(target, field, value);
}
