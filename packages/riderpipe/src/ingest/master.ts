import { parseDateIso } from '../dates.js';
import { assign, parseAmount, parseScore, pick, type AliasMap } from '../fields.js';
import { applyStage, resolveStage } from '../stages.js';
import { eachRow, riderForRow, stampMilestone } from './rows.js';
import type { Ingestor } from './types.js';

/** Column names of the hosted records table, lowercased. */
export const MASTER_COLUMNS: AliasMap<
  | 'phone'
  | 'facebook'
  | 'instagram'
  | 'tags'
  | 'day1Score'
  | 'biggestMistake'
  | 'registered'
  | 'day1'
  | 'stage'
  | 'notes'
  | 'championship'
  | 'followUp'
  | 'revenue'
> = {
  phone: ['phone number', 'phone'],
  facebook: ['fb url', 'facebook url'],
  instagram: ['ig url', 'instagram url'],
  tags: ['tags'],
  day1Score: ['overall score'],
  biggestMistake: ['biggest mistake'],
  registered: ['date blueprint started'],
  day1: ['date day 1'],
  stage: ['stage'],
  notes: ['notes'],
  championship: ['championship'],
  followUp: ['follow up date'],
  revenue: ['revenue'],
};

/**
 * The hosted records table is authoritative and runs last: every non-blank
 * value it holds replaces the local one, and its stage is taken as is.
 */
export const masterIngestor: Ingestor = {
  key: 'master_records',
  phase: 'master',
  ingest(feed, ctx) {
    eachRow(feed, ctx, (row) => {
      const result = riderForRow(row, ctx);
      if (!result.ok) return result;
      const { rider } = result;

      assign(rider, 'phone', pick(row, MASTER_COLUMNS.phone));
      assign(rider, 'facebookUrl', pick(row, MASTER_COLUMNS.facebook));
      assign(rider, 'instagramUrl', pick(row, MASTER_COLUMNS.instagram));
      assign(rider, 'tags', pick(row, MASTER_COLUMNS.tags));
      assign(rider.scores, 'day1', parseScore(pick(row, MASTER_COLUMNS.day1Score)));
      assign(rider, 'biggestMistake', pick(row, MASTER_COLUMNS.biggestMistake));
      assign(rider, 'notes', pick(row, MASTER_COLUMNS.notes));
      assign(rider, 'championship', pick(row, MASTER_COLUMNS.championship));
      assign(rider, 'followUpDate', parseDateIso(pick(row, MASTER_COLUMNS.followUp)));
      assign(rider, 'saleValue', parseAmount(pick(row, MASTER_COLUMNS.revenue)));
      stampMilestone(rider, 'registered', parseDateIso(pick(row, MASTER_COLUMNS.registered)), 'overwrite');
      stampMilestone(rider, 'day1Complete', parseDateIso(pick(row, MASTER_COLUMNS.day1)), 'overwrite');

      const stage = resolveStage(pick(row, MASTER_COLUMNS.stage));
      if (stage) applyStage(rider, stage, 'override');
      return result;
    });
  },
};
