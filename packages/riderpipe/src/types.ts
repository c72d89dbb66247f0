import type { Stage } from './stages.js';

export type OutreachChannel = 'email' | 'facebook_dm' | 'instagram_dm';

export type Milestone =
  | 'outreach'
  | 'registered'
  | 'day1Complete'
  | 'day2Complete'
  | 'callBooked'
  | 'saleClosed'
  | 'flowProfile'
  | 'sleepTest'
  | 'mindsetQuiz'
  | 'raceReview'
  | 'seasonReview';

export type PillarScores = Partial<Record<'mindset' | 'preparation' | 'flow' | 'feedback' | 'sponsorship', number>>;

export interface RiderScores {
  day1: number | null;
  day2: PillarScores;
  flowProfile: number | null;
  sleep: number | null;
  mindset: number | null;
}

export interface Rider {
  key: string;
  firstName: string;
  lastName: string;
  phone: string | null;
  facebookUrl: string | null;
  instagramUrl: string | null;
  linkedinUrl: string | null;
  championship: string | null;
  notes: string | null;
  country: string | null;
  riderType: string | null;
  stage: Stage;
  milestones: Partial<Record<Milestone, string>>;
  saleValue: number | null;
  isDisqualified: boolean;
  disqualificationReason: string | null;
  followUpDate: string | null;
  tags: string;
  outreachChannel: OutreachChannel | null;
  scores: RiderScores;
  flowProfileResult: string | null;
  flowProfileUrl: string | null;
  mindsetResult: string | null;
  biggestMistake: string | null;
}

/** One row of a tabular feed, before normalization. */
export type Row = Record<string, unknown>;

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
