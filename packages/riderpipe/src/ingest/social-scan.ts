import { parseDateIso } from '../dates.js';
import { assign, pick, pickWhere, type NormalizedRow } from '../fields.js';
import { isPlausibleEmail, normalizeEmail } from '../identity.js';
import type { Rider } from '../types.js';
import { eachRow, FIRST_NAME, isEmailColumn, LAST_NAME, stampMilestone } from './rows.js';
import type { Feed, Ingestor } from './types.js';

const SUBMITTED = ['scorecard_finished_at', 'submit_date_utc', 'submit date (utc)', 'sumit date (utc)'] as const;

export interface ScanShape {
  socials: boolean;
  raceReview: boolean;
  seasonReview: boolean;
}

/** Decide from a file's headers and name whether it carries anything to harvest. */
export function scanShape(name: string, columns: string[]): ScanShape | null {
  if (!columns.some(isEmailColumn)) return null;
  const file = name.toLowerCase();
  const shape: ScanShape = {
    socials: columns.some((c) => c.includes('facebook') || c.includes('instagram') || c.includes('linked')),
    raceReview: columns.some((c) => c.includes('what circuit did you race at')) || file.includes('race weekend'),
    seasonReview: columns.some((c) => c.includes('what championship did you race in')) || file.includes('end of season'),
  };
  return shape.socials || shape.raceReview || shape.seasonReview ? shape : null;
}

function harvestSocials(rider: Rider, row: NormalizedRow): void {
  for (const [column, value] of Object.entries(row)) {
    if (!value || !column.includes('url')) continue;
    if (column.includes('facebook')) assign(rider, 'facebookUrl', value);
    else if (column.includes('instagram')) assign(rider, 'instagramUrl', value);
    else if (column.includes('linked')) assign(rider, 'linkedinUrl', value);
  }
}

function columnsOf(feed: Feed): string[] {
  const columns = new Set<string>();
  for (const row of feed.rows.slice(0, 1)) {
    for (const key of Object.keys(row)) columns.add(key.trim().toLowerCase());
  }
  return [...columns];
}

/**
 * Harvests social links and review dates from any export that has an email
 * column. Only rows with a real email are used.
 */
export const socialScanIngestor: Ingestor = {
  key: 'social_scan',
  phase: 'enrichment',
  ingest(feed, ctx) {
    const shape = scanShape(feed.name, columnsOf(feed));
    if (!shape) {
      ctx.logger.info(`[social_scan] ${feed.name}: nothing to harvest`);
      return;
    }
    eachRow(feed, ctx, (row) => {
      const email = pickWhere(row, isEmailColumn);
      if (!isPlausibleEmail(email)) return { ok: false, reason: 'missing email' };
      const rider = ctx.registry.getOrCreate(normalizeEmail(email), pick(row, FIRST_NAME), pick(row, LAST_NAME));

      harvestSocials(rider, row);
      const submitted = parseDateIso(pick(row, SUBMITTED));
      if (shape.raceReview) stampMilestone(rider, 'raceReview', submitted, 'latest');
      if (shape.seasonReview) stampMilestone(rider, 'seasonReview', submitted, 'latest');
      return { ok: true, rider };
    });
  },
};
