import { normalizeRow, pick, pickWhere, type NormalizedRow } from '../fields.js';
import { resolveIdentity } from '../identity.js';
import type { Milestone, Rider } from '../types.js';
import type { Feed, IngestContext, RowResult } from './types.js';

export const FIRST_NAME = ['first_name', 'first name', 'firstname'] as const;
export const LAST_NAME = ['last_name', 'last name', 'lastname', 'surname'] as const;
export const FULL_NAME = ['name', 'full name', 'full_name', 'fullname'] as const;

export const isEmailColumn = (column: string): boolean => column.includes('email');

/**
 * Run `handle` over every row of a feed, recording each outcome in the load
 * report. A row that throws is skipped like any other unusable row.
 */
export function eachRow(feed: Feed, ctx: IngestContext, handle: (row: NormalizedRow) => RowResult): void {
  for (const raw of feed.rows) {
    let result: RowResult;
    try {
      result = handle(normalizeRow(raw));
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      ctx.logger.warn(`[${feed.key}] row skipped: ${message}`);
      result = { ok: false, reason: 'row error' };
    }
    if (result.ok) ctx.report.loaded();
    else ctx.report.skipped(result.reason);
  }
}

export interface NameColumns {
  first?: readonly string[];
  last?: readonly string[];
  full?: readonly string[];
}

/** Resolve the row's identity and get-or-create its rider. */
export function riderForRow(row: NormalizedRow, ctx: IngestContext, names: NameColumns = {}): RowResult {
  const identity = resolveIdentity({
    email: pickWhere(row, isEmailColumn),
    firstName: pick(row, names.first ?? FIRST_NAME),
    lastName: pick(row, names.last ?? LAST_NAME),
    fullName: pick(row, names.full ?? FULL_NAME),
  });
  if (!identity.ok) return identity;
  return { ok: true, rider: ctx.registry.getOrCreate(identity.key, identity.firstName, identity.lastName) };
}

export type StampPolicy = 'fill' | 'overwrite' | 'latest' | 'earliest';

/** Record a milestone timestamp. A null timestamp is ignored. */
export function stampMilestone(rider: Rider, milestone: Milestone, iso: string | null, policy: StampPolicy): void {
  if (!iso) return;
  const current = rider.milestones[milestone];
  if (
    !current ||
    policy === 'overwrite' ||
    (policy === 'latest' && Date.parse(iso) > Date.parse(current)) ||
    (policy === 'earliest' && Date.parse(iso) < Date.parse(current))
  ) {
    rider.milestones[milestone] = iso;
  }
}

/** Union of two comma-separated tag lists, keeping first-seen order. */
export function mergeTags(existing: string, incoming: string): string {
  const seen = new Map<string, string>();
  for (const tag of [...existing.split(','), ...incoming.split(',')]) {
    const trimmed = tag.trim();
    if (trimmed && !seen.has(trimmed.toLowerCase())) seen.set(trimmed.toLowerCase(), trimmed);
  }
  return [...seen.values()].join(',');
}
