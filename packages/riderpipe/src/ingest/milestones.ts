import { parseDateIso } from '../dates.js';
import { assign, fill, isTruthy, parseScore, pick, type NormalizedRow } from '../fields.js';
import { applyStage, type Stage } from '../stages.js';
import type { Milestone, Rider } from '../types.js';
import { eachRow, riderForRow, stampMilestone, type NameColumns, type StampPolicy } from './rows.js';
import type { Ingestor } from './types.js';

/** Date columns tried, in order, for the milestone a row represents. */
export const MILESTONE_DATE_COLUMNS = [
  'scorecard_finished_at',
  'submit_date_utc',
  'submit date (utc)',
  'stage_date_utc',
  'date',
  'timestamp',
  'created at',
  'submit date',
] as const;

const SCORE = ['overall score - actual', 'score'] as const;

export interface MilestoneFeedDefinition {
  key: string;
  stage: Stage;
  milestone: Milestone;
  stampPolicy?: StampPolicy;
  names?: NameColumns;
  /** Returns a skip reason when the row does not evidence the milestone. */
  accept?(row: NormalizedRow): string | null;
  apply?(rider: Rider, row: NormalizedRow): void;
}

/**
 * Build an ingestor for a feed whose rows each mean "this rider reached
 * `stage`". The stage moves forward only; the timestamp is recorded
 * independently, so an unparseable date never blocks the stage.
 */
export function milestoneFeed(definition: MilestoneFeedDefinition): Ingestor {
  return {
    key: definition.key,
    phase: 'milestone',
    ingest(feed, ctx) {
      eachRow(feed, ctx, (row) => {
        const rejected = definition.accept?.(row);
        if (rejected) return { ok: false, reason: rejected };
        const result = riderForRow(row, ctx, definition.names);
        if (!result.ok) return result;
        const { rider } = result;
        definition.apply?.(rider, row);
        applyStage(rider, definition.stage, 'automatic');
        stampMilestone(rider, definition.milestone, parseDateIso(pick(row, MILESTONE_DATE_COLUMNS)), definition.stampPolicy ?? 'fill');
        return result;
      });
    },
  };
}

const PILLARS = [
  ['pillar 1', 'mindset'],
  ['pillar 2', 'preparation'],
  ['pillar 3', 'flow'],
  ['pillar 4', 'feedback'],
  ['pillar 5', 'sponsorship'],
] as const;

export function flowProfileResult(endingUrl: string): string | null {
  if (!endingUrl) return null;
  const url = endingUrl.toLowerCase();
  if (url.includes('go-getter')) return 'Go Getter';
  if (url.includes('deepthinker')) return 'Deep Thinker';
  return 'Completed';
}

export const flowProfileIngestor = milestoneFeed({
  key: 'flow_profile',
  stage: 'flow_profile_completed',
  milestone: 'flowProfile',
  apply(rider, row) {
    assign(rider.scores, 'flowProfile', parseScore(row['score'] ?? ''));
    const ending = row['ending'] ?? '';
    assign(rider, 'flowProfileUrl', ending);
    assign(rider, 'flowProfileResult', flowProfileResult(ending));
  },
});

export const sleepTestIngestor = milestoneFeed({
  key: 'sleep_test',
  stage: 'sleep_test_completed',
  milestone: 'sleepTest',
  apply(rider, row) {
    assign(rider.scores, 'sleep', parseScore(pick(row, SCORE)));
  },
});

export const mindsetQuizIngestor = milestoneFeed({
  key: 'mindset_quiz',
  stage: 'mindset_quiz_completed',
  milestone: 'mindsetQuiz',
  apply(rider, row) {
    assign(rider.scores, 'mindset', parseScore(pick(row, SCORE)));
    assign(rider, 'mindsetResult', pick(row, ['outcome', 'your mindset']));
  },
});

export const raceReviewIngestor = milestoneFeed({
  key: 'race_reviews',
  stage: 'race_review_completed',
  milestone: 'raceReview',
  stampPolicy: 'latest',
});

export const blueprintRegistrationIngestor = milestoneFeed({
  key: 'blueprint_registrations',
  stage: 'registered',
  milestone: 'registered',
  apply(rider, row) {
    fill(rider, 'phone', pick(row, ['phone', 'phone number']));
    fill(rider, 'country', row['country']);
    fill(rider, 'riderType', row['rider_type']);
  },
});

export const day1AssessmentIngestor = milestoneFeed({
  key: 'day1_assessments',
  stage: 'day1_complete',
  milestone: 'day1Complete',
  accept: (row) => (isTruthy(row['completed'] ?? '') ? null : 'assessment not completed'),
  apply(rider, row) {
    assign(rider.scores, 'day1', parseScore(pick(row, SCORE)));
    assign(rider, 'biggestMistake', pick(row, ['biggest mistake', 'biggest_mistake']));
  },
});

export const day2AssessmentIngestor = milestoneFeed({
  key: 'day2_assessments',
  stage: 'day2_complete',
  milestone: 'day2Complete',
  apply(rider, row) {
    for (const [pillar, name] of PILLARS) {
      const column = Object.keys(row).find((c) => c.includes(pillar) && c.includes('rate'));
      const score = column ? parseScore(row[column]) : null;
      if (score !== null) rider.scores.day2[name] = score;
    }
  },
});

export const strategyCallIngestor = milestoneFeed({
  key: 'strategy_call_applications',
  stage: 'strategy_call_booked',
  milestone: 'callBooked',
  apply(rider, row) {
    assign(rider, 'phone', pick(row, ['phone', 'phone number']));
    assign(rider, 'country', row['country']);
    assign(rider, 'riderType', row['rider_type']);
    assign(rider, 'championship', pick(row, ['championship_racing_in', 'championship']));
  },
});
