import { parseDateIso } from '../dates.js';
import { assign, isTruthy, parseAmount, pick, pickWhere, type AliasMap, type NormalizedRow } from '../fields.js';
import { applyStage, resolveStage } from '../stages.js';
import { eachRow, FIRST_NAME, LAST_NAME, riderForRow, stampMilestone } from './rows.js';
import type { Ingestor } from './types.js';

const COLUMNS: AliasMap<'fullName' | 'championship' | 'notes' | 'revenue' | 'status' | 'client' | 'notFit' | 'followUp'> = {
  fullName: ['name', 'full name', 'fullname', 'rider', 'rider name', 'competitor', 'driver'],
  championship: ['championship', 'series', 'class'],
  notes: ['notes', 'note', 'comments'],
  revenue: ['revenue', 'sale value', 'sale_value', 'amount'],
  status: ['status', 'stage'],
  client: ['client', 'is_client'],
  notFit: ['not a fit', 'not_fit', 'dq'],
  followUp: ['follow up', 'follow_up', 'follow up date'],
};

/** Accepts a full URL or a bare handle. */
export function instagramUrl(value: string): string {
  const handle = value.trim();
  if (!handle || handle.includes('instagram.com') || handle.startsWith('http') || handle.includes('facebook')) {
    return handle;
  }
  return `https://www.instagram.com/${handle.replace(/^@/, '')}/`;
}

function instagramValue(row: NormalizedRow): string {
  return (
    pickWhere(row, (c) => c.includes('instagram')) ||
    pickWhere(row, (c) => c === 'ig' || c.includes('username') || c === 'user name')
  );
}

/**
 * The hand-kept roster. Its contact details and names overwrite what the
 * automated feeds found, its status column advances the stage like any other
 * feed, and its client / not-a-fit flags are explicit decisions that override
 * the stage outright.
 */
export const riderDatabaseIngestor: Ingestor = {
  key: 'rider_database',
  phase: 'enrichment',
  ingest(feed, ctx) {
    eachRow(feed, ctx, (row) => {
      const result = riderForRow(row, ctx, { full: COLUMNS.fullName });
      if (!result.ok) return result;
      const { rider } = result;

      assign(rider, 'firstName', pick(row, FIRST_NAME));
      assign(rider, 'lastName', pick(row, LAST_NAME));
      stampMilestone(rider, 'outreach', parseDateIso(row['date_joined']), 'fill');

      assign(rider, 'facebookUrl', pickWhere(row, (c) => c.includes('facebook') || c === 'fb'));
      assign(rider, 'phone', pickWhere(row, (c) => c.includes('phone')));
      assign(rider, 'instagramUrl', instagramUrl(instagramValue(row)));
      assign(rider, 'championship', pick(row, COLUMNS.championship));
      assign(rider, 'notes', pick(row, COLUMNS.notes));
      assign(rider, 'saleValue', parseAmount(pick(row, COLUMNS.revenue)));
      assign(rider, 'followUpDate', parseDateIso(pick(row, COLUMNS.followUp)));

      const status = resolveStage(pick(row, COLUMNS.status));
      if (status) applyStage(rider, status, 'automatic');

      if (isTruthy(pick(row, COLUMNS.client))) {
        applyStage(rider, 'client', 'override');
        stampMilestone(rider, 'saleClosed', ctx.now.toISOString(), 'fill');
      }
      if (isTruthy(pick(row, COLUMNS.notFit))) {
        applyStage(rider, 'not_a_fit', 'override');
        rider.isDisqualified = true;
      }
      return result;
    });
  },
};
