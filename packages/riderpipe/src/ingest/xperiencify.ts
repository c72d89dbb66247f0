import { parseDateIso } from '../dates.js';
import { assign, pick } from '../fields.js';
import { applyStage, type Stage } from '../stages.js';
import { eachRow, mergeTags, riderForRow, stampMilestone } from './rows.js';
import type { Ingestor } from './types.js';

/** Course tags, most advanced first. */
const TAG_STAGES: ReadonlyArray<[tag: string, stage: Stage]> = [
  ['day 2 completed', 'day2_complete'],
  ['day 1 completed', 'day1_complete'],
  ['mission accepted', 'registered'],
  ['blueprint started', 'registered'],
];

export function stageFromTags(tags: string): Stage | null {
  const lower = tags.toLowerCase();
  return TAG_STAGES.find(([tag]) => lower.includes(tag))?.[1] ?? null;
}

export const xperiencifyIngestor: Ingestor = {
  key: 'xperiencify',
  phase: 'milestone',
  ingest(feed, ctx) {
    eachRow(feed, ctx, (row) => {
      const result = riderForRow(row, ctx);
      if (!result.ok) return result;
      const { rider } = result;

      assign(rider, 'phone', pick(row, ['phone', 'phone number']));
      const tags = row['tags'] ?? '';
      if (tags) rider.tags = mergeTags(rider.tags, tags);

      const joined = parseDateIso(row['date_joined']);
      stampMilestone(rider, 'registered', joined, 'fill');
      stampMilestone(rider, 'outreach', joined, 'fill');

      const stage = stageFromTags(tags);
      if (stage) applyStage(rider, stage, 'automatic');
      return result;
    });
  },
};
