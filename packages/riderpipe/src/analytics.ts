import { format, isSameDay } from 'date-fns';
import { daysBetween } from './dates.js';
import { fullName } from './registry.js';
import { FUNNEL, STAGE_MILESTONES, STAGES, stageRank, type Stage } from './stages.js';
import type { Milestone, Rider } from './types.js';

export function stageCounts(riders: Rider[]): Map<Stage, number> {
  const counts = new Map<Stage, number>(STAGES.map((stage) => [stage, 0]));
  for (const rider of riders) counts.set(rider.stage, (counts.get(rider.stage) ?? 0) + 1);
  return counts;
}

export interface FunnelStep {
  stage: Stage;
  current: number;
  /** Riders at this stage or beyond, or with this stage's milestone on record. */
  reached: number;
  /** `reached` as a share of the first step. */
  pct: number;
}

function hasReached(rider: Rider, stage: Stage): boolean {
  const milestone = STAGE_MILESTONES[stage];
  if (milestone && rider.milestones[milestone]) return true;
  const current = stageRank(rider.stage);
  const target = stageRank(stage);
  return current !== null && target !== null && current >= target;
}

export function funnel(riders: Rider[]): FunnelStep[] {
  const counts = stageCounts(riders);
  const steps = FUNNEL.map((stage) => ({
    stage,
    current: counts.get(stage) ?? 0,
    reached: riders.filter((r) => hasReached(r, stage)).length,
    pct: 0,
  }));
  const top = steps[0]?.reached ?? 0;
  for (const step of steps) step.pct = top > 0 ? Math.round((step.reached / top) * 100) : 0;
  return steps;
}

export interface RevenueTargets {
  monthly_revenue: number;
  programme_price: number;
}

export interface RevenueMetrics {
  target: number;
  actual: number;
  pipeline: number;
  progressPct: number;
  clients: number;
  callsBooked: number;
}

/** Share of a booked call's value counted toward the weighted pipeline. */
export const CALL_WEIGHT = 0.25;

export function revenueMetrics(riders: Rider[], targets: RevenueTargets): RevenueMetrics {
  let actual = 0;
  let clients = 0;
  let callsBooked = 0;
  for (const rider of riders) {
    if (rider.stage === 'client') {
      clients++;
      actual += rider.saleValue ?? targets.programme_price;
    } else if (rider.stage === 'strategy_call_booked') {
      callsBooked++;
    }
  }
  const target = targets.monthly_revenue;
  return {
    target,
    actual,
    pipeline: callsBooked * targets.programme_price * CALL_WEIGHT,
    progressPct: target > 0 ? Math.round((actual / target) * 1000) / 10 : 0,
    clients,
    callsBooked,
  };
}

/** Days since the rider entered its current stage, when that is on record. */
export function daysInStage(rider: Rider, now: Date): number | null {
  const milestone = STAGE_MILESTONES[rider.stage];
  const since = milestone ? rider.milestones[milestone] : undefined;
  return since ? daysBetween(since, now) : null;
}

export type StallKind = 'registered_no_day1' | 'day1_no_day2' | 'day2_no_call' | 'messaged_no_reply';

const STALL_STAGES: ReadonlyArray<[Stage, StallKind]> = [
  ['registered', 'registered_no_day1'],
  ['day1_complete', 'day1_no_day2'],
  ['day2_complete', 'day2_no_call'],
  ['messaged', 'messaged_no_reply'],
];

export interface StalledRider {
  rider: Rider;
  days: number;
}

export function stalledRiders(riders: Rider[], thresholdDays: number, now: Date): Record<StallKind, StalledRider[]> {
  const out: Record<StallKind, StalledRider[]> = {
    registered_no_day1: [],
    day1_no_day2: [],
    day2_no_call: [],
    messaged_no_reply: [],
  };
  for (const rider of riders) {
    const kind = STALL_STAGES.find(([stage]) => stage === rider.stage)?.[1];
    if (!kind) continue;
    const days = daysInStage(rider, now);
    if (days === null || days < thresholdDays) continue;
    out[kind].push({ rider, days });
  }
  for (const list of Object.values(out)) list.sort((a, b) => b.days - a.days);
  return out;
}

/** Riders whose follow-up date is today or earlier, oldest first. */
export function dueFollowUps(riders: Rider[], now: Date): Rider[] {
  const end = new Date(now);
  end.setHours(23, 59, 59, 999);
  return riders
    .filter((r) => r.followUpDate && Date.parse(r.followUpDate) <= end.getTime())
    .sort((a, b) => Date.parse(a.followUpDate ?? '') - Date.parse(b.followUpDate ?? ''));
}

export interface ConversionRates {
  outreach_to_registration: number;
  registration_to_day1: number;
  day1_to_day2: number;
  day2_to_strategy_call: number;
  strategy_call_to_sale: number;
}

export const DEFAULT_CONVERSION_RATES: ConversionRates = {
  outreach_to_registration: 0.08,
  registration_to_day1: 0.7,
  day1_to_day2: 0.6,
  day2_to_strategy_call: 0.4,
  strategy_call_to_sale: 0.25,
};

export interface ActivityTargets {
  revenue: number;
  sales: number;
  strategyCalls: number;
  day2Completions: number;
  day1Completions: number;
  registrations: number;
  outreach: number;
}

export interface FunnelTargets {
  monthly: ActivityTargets;
  weekly: ActivityTargets;
  dailyOutreach: number;
}

/** Riders needed at the step before, given how many are needed after it. */
function needed(after: number, rate: number): number {
  return Math.floor(after / rate) + 1;
}

const quarter = (n: number): number => Math.max(1, Math.floor(n / 4));

/**
 * Work back from the monthly revenue target to the activity each funnel step
 * needs. Weeks are a quarter of the month and outreach runs five days a week.
 */
export function calculateTargets(targets: RevenueTargets, rates: ConversionRates = DEFAULT_CONVERSION_RATES): FunnelTargets {
  const sales = needed(targets.monthly_revenue, targets.programme_price);
  const strategyCalls = needed(sales, rates.strategy_call_to_sale);
  const day2Completions = needed(strategyCalls, rates.day2_to_strategy_call);
  const day1Completions = needed(day2Completions, rates.day1_to_day2);
  const registrations = needed(day1Completions, rates.registration_to_day1);
  const outreach = needed(registrations, rates.outreach_to_registration);
  const monthly = { revenue: targets.monthly_revenue, sales, strategyCalls, day2Completions, day1Completions, registrations, outreach };
  const weekly: ActivityTargets = {
    revenue: monthly.revenue / 4,
    sales: quarter(sales),
    strategyCalls: quarter(strategyCalls),
    day2Completions: quarter(day2Completions),
    day1Completions: quarter(day1Completions),
    registrations: quarter(registrations),
    outreach: quarter(outreach),
  };
  return { monthly, weekly, dailyOutreach: Math.max(1, Math.floor(weekly.outreach / 5)) };
}

/** Riders currently waiting at each step the forecast projects from. */
export interface FunnelPosition {
  outreach: number;
  registered: number;
  day1: number;
  day2: number;
  calls: number;
}

/** Messaged, replied and link-sent riders, side stages included, count as outreach. */
export function funnelPosition(riders: Rider[]): FunnelPosition {
  const position: FunnelPosition = { outreach: 0, registered: 0, day1: 0, day2: 0, calls: 0 };
  for (const rider of riders) {
    const rank = stageRank(rider.stage);
    if (rank !== null && rank >= 1 && rank <= 3) position.outreach++;
    else if (rider.stage === 'registered') position.registered++;
    else if (rider.stage === 'day1_complete') position.day1++;
    else if (rider.stage === 'day2_complete') position.day2++;
    else if (rider.stage === 'strategy_call_booked') position.calls++;
  }
  return position;
}

export interface RevenueForecast {
  registrations: number;
  day1: number;
  day2: number;
  calls: number;
  sales: number;
  revenue: number;
}

/** Project the current funnel forward: each step adds the riders the step before is expected to convert. */
export function forecastRevenue(
  position: FunnelPosition,
  programmePrice: number,
  rates: ConversionRates = DEFAULT_CONVERSION_RATES,
): RevenueForecast {
  const registrations = position.outreach * rates.outreach_to_registration;
  const day1 = (position.registered + registrations) * rates.registration_to_day1;
  const day2 = (position.day1 + day1) * rates.day1_to_day2;
  const calls = (position.day2 + day2) * rates.day2_to_strategy_call;
  const sales = (position.calls + calls) * rates.strategy_call_to_sale;
  return { registrations, day1, day2, calls, sales, revenue: sales * programmePrice };
}

export interface DailyMetrics {
  date: string;
  outreachSent: number;
  newRegistered: number;
  day1Completed: number;
  day2Completed: number;
  callsBooked: number;
  salesClosed: number;
}

const DAILY_MILESTONES: ReadonlyArray<[Milestone, Exclude<keyof DailyMetrics, 'date'>]> = [
  ['outreach', 'outreachSent'],
  ['registered', 'newRegistered'],
  ['day1Complete', 'day1Completed'],
  ['day2Complete', 'day2Completed'],
  ['callBooked', 'callsBooked'],
  ['saleClosed', 'salesClosed'],
];

/** Milestones stamped on the local calendar day of `day`. */
export function dailyMetrics(riders: Rider[], day: Date): DailyMetrics {
  const metrics: DailyMetrics = {
    date: format(day, 'yyyy-MM-dd'),
    outreachSent: 0,
    newRegistered: 0,
    day1Completed: 0,
    day2Completed: 0,
    callsBooked: 0,
    salesClosed: 0,
  };
  for (const rider of riders) {
    for (const [milestone, field] of DAILY_MILESTONES) {
      const at = rider.milestones[milestone];
      if (at && isSameDay(new Date(at), day)) metrics[field]++;
    }
  }
  return metrics;
}

/** Longer names are concatenation debris from bad exports, never real riders. */
const MAX_NAME_LENGTH = 60;

const nameTokens = (name: string): string[] => name.toLowerCase().split(/\s+/).filter(Boolean);

/**
 * Match a name from a results sheet to a rider: exact full name, then a
 * "Last, First" swap, then any rider with two or more name words in common.
 * A single word never matches a rider with a longer name.
 */
export function matchRaceName(riders: Rider[], rawName: string): Rider | null {
  const wanted = nameTokens(rawName).join(' ');
  if (!wanted) return null;
  const named = riders.map((rider) => ({ rider, name: nameTokens(fullName(rider)).join(' ') })).filter((r) => r.name);

  const exact = named.find((r) => r.name === wanted);
  if (exact) return exact.rider;

  const comma = wanted.indexOf(',');
  if (comma >= 0) {
    const swapped = nameTokens(`${wanted.slice(comma + 1)} ${wanted.slice(0, comma)}`).join(' ');
    const match = named.find((r) => r.name === swapped);
    if (match) return match.rider;
  }

  const tokens = new Set(nameTokens(wanted));
  for (const { rider, name } of named) {
    if (name.length > MAX_NAME_LENGTH) continue;
    const own = new Set(nameTokens(name));
    if (own.size < 2) continue;
    const common = [...own].filter((token) => tokens.has(token)).length;
    if (common >= 2) return rider;
  }
  return null;
}

export interface RaceResult {
  name: string;
  status: 'match_found' | 'new_prospect';
  /** Key of the matched rider. */
  key: string | null;
  stage: Stage | null;
  facebookUrl: string | null;
  /** Opening message for the rider. */
  message: string;
}

const titleCase = (word: string): string => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();

export function raceOutreachMessage(name: string, rider: Rider | null, event: string): string {
  const firstName = rider?.firstName || titleCase(name.trim().split(/\s+/)[0] ?? '');
  if (rider?.milestones.raceReview) {
    return `Hey ${firstName}, great to see you out at ${event}! Saw you already did your review - how are you feeling about the progress since then?`;
  }
  return `Hey ${firstName}, I see you were out at ${event} at the weekend. How did it go?`;
}

/** Classify each name on a results list as a known rider or a new prospect. Blank lines are dropped. */
export function processRaceResults(riders: Rider[], names: string[], event: string): RaceResult[] {
  const results: RaceResult[] = [];
  for (const raw of names) {
    const name = raw.trim();
    if (!name) continue;
    const rider = matchRaceName(riders, name);
    results.push({
      name,
      status: rider ? 'match_found' : 'new_prospect',
      key: rider?.key ?? null,
      stage: rider?.stage ?? null,
      facebookUrl: rider?.facebookUrl ?? null,
      message: raceOutreachMessage(name, rider, event),
    });
  }
  return results;
}
