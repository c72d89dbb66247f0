import { parseEpochMillis } from '../dates.js';
import { fill, normalizeRow, type NormalizedRow } from '../fields.js';
import { slugify, splitName } from '../identity.js';
import { applyStage } from '../stages.js';
import { stampMilestone } from './rows.js';
import type { Ingestor } from './types.js';

const EARLIEST_PLAUSIBLE = Date.UTC(2001, 0, 1);

export function conversationName(title: string): string {
  return title.replace(/[^\p{L}\p{N} ]/gu, '').replace(/\s+/g, ' ').trim();
}

function groupByTitle(rows: NormalizedRow[]): Map<string, NormalizedRow[]> {
  const groups = new Map<string, NormalizedRow[]>();
  for (const row of rows) {
    const title = (row['title'] ?? '').trim();
    const group = groups.get(title);
    if (group) group.push(row);
    else groups.set(title, [row]);
  }
  return groups;
}

/**
 * Messenger export: one row per message, grouped into conversations by title.
 * Each conversation is a rider who has been messaged; the earliest message is
 * the outreach date.
 */
export const facebookHistoryIngestor: Ingestor = {
  key: 'facebook_history',
  phase: 'enrichment',
  ingest(feed, ctx) {
    const owner = (ctx.options.ownerName ?? '').trim().toLowerCase();
    for (const [title, rows] of groupByTitle(feed.rows.map(normalizeRow))) {
      const name = conversationName(title);
      let skip: string | null = null;
      if (!name || name.toLowerCase() === 'nan') skip = 'missing identity';
      else if (owner && name.toLowerCase() === owner) skip = 'own conversation';
      if (skip) {
        for (let i = 0; i < rows.length; i++) ctx.report.skipped(skip);
        continue;
      }

      let rider = ctx.registry.findByName(name);
      if (!rider) {
        const { firstName, lastName } = splitName(name);
        rider = ctx.registry.getOrCreate(slugify(name), firstName, lastName);
      }
      fill(rider, 'outreachChannel', 'facebook_dm');
      applyStage(rider, 'messaged', 'automatic');

      for (const row of rows) {
        const sent = parseEpochMillis(row['messages__timestamp_ms'] ?? '');
        if (sent && sent.getTime() >= EARLIEST_PLAUSIBLE) {
          stampMilestone(rider, 'outreach', sent.toISOString(), 'earliest');
        }
        ctx.report.loaded();
      }
    }
  },
};
