import type { Milestone, Rider } from './types.js';

export const STAGES = [
  'contact',
  'follow_up',
  'no_socials',
  'messaged',
  'race_weekend',
  'flow_profile_completed',
  'mindset_quiz_completed',
  'sleep_test_completed',
  'race_review_completed',
  'season_review_completed',
  'replied',
  'link_sent',
  'registered',
  'day1_complete',
  'day2_complete',
  'strategy_call_booked',
  'client',
  'not_a_fit',
] as const;

export type Stage = (typeof STAGES)[number];

export const INITIAL_STAGE: Stage = 'contact';

export const STAGE_LABELS: Record<Stage, string> = {
  contact: 'Contact',
  follow_up: 'Follow up',
  no_socials: 'No Socials Found',
  messaged: 'Messaged',
  race_weekend: 'Race Weekend',
  flow_profile_completed: 'Flow Profile Completed',
  mindset_quiz_completed: 'Mindset Quiz Completed',
  sleep_test_completed: 'Sleep Test Completed',
  race_review_completed: 'Race Weekend Review Completed',
  season_review_completed: 'End of Season Review Completed',
  replied: 'Replied',
  link_sent: 'Link Sent',
  registered: 'Podium Contenders Blueprint Started',
  day1_complete: 'Day 1 Completed',
  day2_complete: 'Day 2 Completed',
  strategy_call_booked: 'Strategy Call Booked',
  client: 'Client',
  not_a_fit: 'Not a good fit',
};

/**
 * Position in the main funnel. Side stages share the rank of the main stage
 * they sit beside, so lead-magnet completions never outrank a reply.
 * `not_a_fit` has no rank; it is terminal.
 */
const RANK: Record<Exclude<Stage, 'not_a_fit'>, number> = {
  contact: 0,
  follow_up: 0,
  no_socials: 0,
  messaged: 1,
  race_weekend: 1,
  flow_profile_completed: 1,
  mindset_quiz_completed: 1,
  sleep_test_completed: 1,
  race_review_completed: 1,
  season_review_completed: 1,
  replied: 2,
  link_sent: 3,
  registered: 4,
  day1_complete: 5,
  day2_complete: 6,
  strategy_call_booked: 7,
  client: 8,
};

/** The main funnel, in order. */
export const FUNNEL: Stage[] = [
  'contact',
  'messaged',
  'replied',
  'link_sent',
  'registered',
  'day1_complete',
  'day2_complete',
  'strategy_call_booked',
  'client',
];

export const TERMINAL_STAGES: ReadonlySet<Stage> = new Set<Stage>(['client', 'not_a_fit']);

/** Milestone stamped when a rider is explicitly moved into a stage. */
export const STAGE_MILESTONES: Partial<Record<Stage, Milestone>> = {
  messaged: 'outreach',
  registered: 'registered',
  day1_complete: 'day1Complete',
  day2_complete: 'day2Complete',
  strategy_call_booked: 'callBooked',
  client: 'saleClosed',
  flow_profile_completed: 'flowProfile',
  sleep_test_completed: 'sleepTest',
  mindset_quiz_completed: 'mindsetQuiz',
  race_review_completed: 'raceReview',
  season_review_completed: 'seasonReview',
};

const ALIASES: Record<string, Stage> = {
  'outreach': 'messaged',
  'contacted': 'messaged',
  'dm sent': 'messaged',
  'reply': 'replied',
  'responded': 'replied',
  'link': 'link_sent',
  'blueprint link sent': 'link_sent',
  'registered': 'registered',
  'blueprint started': 'registered',
  'blueprint registered': 'registered',
  'mission accepted': 'registered',
  'day 1': 'day1_complete',
  'day 1 complete': 'day1_complete',
  'day1': 'day1_complete',
  'day 2': 'day2_complete',
  'day 2 complete': 'day2_complete',
  'day2': 'day2_complete',
  'strategy call': 'strategy_call_booked',
  'call booked': 'strategy_call_booked',
  'sale closed': 'client',
  'won': 'client',
  'closed': 'client',
  'lost': 'not_a_fit',
  'no sale': 'not_a_fit',
  'not a fit': 'not_a_fit',
  'disqualified': 'not_a_fit',
  'dq': 'not_a_fit',
  'follow-up': 'follow_up',
  'no socials': 'no_socials',
  'race weekend review': 'race_review_completed',
  'end of season review': 'season_review_completed',
};

const LOOKUP = new Map<string, Stage>();
for (const stage of STAGES) {
  LOOKUP.set(stage, stage);
  LOOKUP.set(stage.replace(/_/g, ' '), stage);
  LOOKUP.set(STAGE_LABELS[stage].toLowerCase(), stage);
}
for (const [alias, stage] of Object.entries(ALIASES)) LOOKUP.set(alias, stage);

export function isStage(value: string): value is Stage {
  return STAGES.some((stage) => stage === value);
}

/** Resolve a stage key, display label or legacy alias. */
export function resolveStage(raw: string): Stage | null {
  const cleaned = raw.trim().toLowerCase().replace(/\s+/g, ' ');
  if (!cleaned) return null;
  return LOOKUP.get(cleaned) ?? null;
}

export type StageFilter = { ok: true; stages: Stage[] } | { ok: false; unknown: string };

/** Resolve a comma-separated stage filter, naming the first entry that is not a stage. */
export function resolveStageFilter(raw: string): StageFilter {
  const stages: Stage[] = [];
  for (const part of raw.split(',')) {
    const stage = resolveStage(part);
    if (!stage) return { ok: false, unknown: part.trim() };
    stages.push(stage);
  }
  return { ok: true, stages };
}

export function stageRank(stage: Stage): number | null {
  return stage === 'not_a_fit' ? null : RANK[stage];
}

export type StageMode = 'automatic' | 'override';

/**
 * Move a rider to `target`. Automatic moves only go forward and never leave a
 * terminal stage; overrides always apply. Returns whether the stage changed.
 *
 * At equal rank only a main funnel stage gives way to a side stage: a rider
 * who completed the flow profile stays there when a Messenger thread or a
 * second lead magnet turns up.
 */
export function applyStage(rider: Rider, target: Stage, mode: StageMode): boolean {
  if (rider.stage === target) return false;
  if (mode === 'automatic') {
    if (TERMINAL_STAGES.has(rider.stage)) return false;
    const current = stageRank(rider.stage);
    const next = stageRank(target);
    if (current !== null && next !== null && next < current) return false;
    if (current !== null && current === next && !FUNNEL.includes(rider.stage)) return false;
  }
  rider.stage = target;
  return true;
}
