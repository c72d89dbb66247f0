import { applyEdit, orderEdits, parseEditRow, type EditEntry } from '../edits.js';
import { normalizeRow } from '../fields.js';
import type { Ingestor } from './types.js';

/**
 * Replays the append-only edit log. Every entry is validated first; invalid
 * entries are skipped and the rest are applied once each, oldest first.
 */
export const manualEditIngestor: Ingestor = {
  key: 'manual_edits',
  phase: 'manual',
  ingest(feed, ctx) {
    const entries: EditEntry[] = [];
    for (const raw of feed.rows) {
      const parsed = parseEditRow(normalizeRow(raw));
      if (parsed.ok) entries.push(parsed.entry);
      else ctx.report.skipped(parsed.reason);
    }
    for (const entry of orderEdits(entries)) {
      applyEdit(ctx.registry.getOrCreate(entry.key), entry);
      ctx.report.loaded();
    }
  },
};
