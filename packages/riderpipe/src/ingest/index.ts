import { facebookHistoryIngestor } from './facebook-history.js';
import { manualEditIngestor } from './manual.js';
import { masterIngestor } from './master.js';
import {
  blueprintRegistrationIngestor,
  day1AssessmentIngestor,
  day2AssessmentIngestor,
  flowProfileIngestor,
  mindsetQuizIngestor,
  raceReviewIngestor,
  sleepTestIngestor,
  strategyCallIngestor,
} from './milestones.js';
import { riderDatabaseIngestor } from './rider-database.js';
import { socialScanIngestor } from './social-scan.js';
import { PHASES, type Ingestor } from './types.js';
import { xperiencifyIngestor } from './xperiencify.js';

/** Every ingestor, in pipeline order. */
export const INGESTORS: readonly Ingestor[] = [
  flowProfileIngestor,
  sleepTestIngestor,
  mindsetQuizIngestor,
  raceReviewIngestor,
  blueprintRegistrationIngestor,
  xperiencifyIngestor,
  day1AssessmentIngestor,
  day2AssessmentIngestor,
  strategyCallIngestor,
  manualEditIngestor,
  riderDatabaseIngestor,
  socialScanIngestor,
  facebookHistoryIngestor,
  masterIngestor,
];

/**
 * Sort ingestors into phase order. Within a phase the given order is kept, so
 * the milestone feeds run in the order listed above.
 */
export function orderByPhase(ingestors: readonly Ingestor[]): Ingestor[] {
  return [...ingestors].sort((a, b) => PHASES.indexOf(a.phase) - PHASES.indexOf(b.phase));
}

export type FeedKey =
  | 'flow_profile'
  | 'sleep_test'
  | 'mindset_quiz'
  | 'race_reviews'
  | 'blueprint_registrations'
  | 'xperiencify'
  | 'day1_assessments'
  | 'day2_assessments'
  | 'strategy_call_applications'
  | 'manual_edits'
  | 'rider_database'
  | 'social_scan'
  | 'facebook_history'
  | 'master_records';

export const FEED_KEYS: readonly FeedKey[] = [
  'flow_profile',
  'sleep_test',
  'mindset_quiz',
  'race_reviews',
  'blueprint_registrations',
  'xperiencify',
  'day1_assessments',
  'day2_assessments',
  'strategy_call_applications',
  'manual_edits',
  'rider_database',
  'social_scan',
  'facebook_history',
  'master_records',
];

export { milestoneFeed, flowProfileResult, MILESTONE_DATE_COLUMNS } from './milestones.js';
export { stageFromTags } from './xperiencify.js';
export { instagramUrl } from './rider-database.js';
export { scanShape } from './social-scan.js';
export { conversationName } from './facebook-history.js';
export { MASTER_COLUMNS } from './master.js';
export { mergeTags } from './rows.js';
export { PHASES } from './types.js';
export type { Feed, IngestContext, IngestOptions, Ingestor, Phase, RowResult } from './types.js';
