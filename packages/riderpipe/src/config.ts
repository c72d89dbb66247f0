import yaml from 'js-yaml';
import { z } from 'zod';
import type { FeedKey } from './ingest/index.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Recursively expand ${ENV_VAR} and $ENV_VAR references in string values. */
export function expandEnv(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    // Full replacement: entire value is a single env ref
    const whole = /^\$\{([A-Za-z_][A-Za-z0-9_]*)\}$/.exec(value) ?? /^\$([A-Za-z_][A-Za-z0-9_]*)$/.exec(value);
    if (whole) return env[whole[1]] ?? value;
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (match, name: string) => env[name] ?? match);
  }
  if (Array.isArray(value)) return value.map((item) => expandEnv(item, env));
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = expandEnv(v, env);
    return out;
  }
  return value;
}

/** A config value, or undefined when it is blank or still holds an unset env reference. */
export function resolved(value: string | undefined): string | undefined {
  if (!value || /\$\{?[A-Za-z_]/.test(value)) return undefined;
  return value;
}

const feedSchema = z
  .object({
    file: z.string().min(1).optional(),
    sheet: z.string().min(1).optional(),
    range: z.string().min(1).optional(),
    header_row: z.number().int().min(1).default(1),
    enabled: z.boolean().default(true),
  })
  .refine((feed) => !(feed.file && feed.sheet), { message: 'set either file or sheet, not both' });

export type FeedConfig = z.infer<typeof feedSchema>;

const blankToUndefined = (value: unknown): unknown => (value === '' ? undefined : value);
const optionalText = z.preprocess(blankToUndefined, z.string().optional());

const rate = (fallback: number) => z.number().gt(0).max(1).default(fallback);

export const configSchema = z.object({
  feeds_dir: z.string().default('feeds'),
  feeds: z.record(feedSchema).default({}),
  social_scan: z.boolean().default(true),
  sheets: z.object({ access_token: optionalText }).default({}),
  records: z
    .object({
      api_key: optionalText,
      base_id: optionalText,
      table: z.string().default('Riders'),
      api_url: optionalText,
    })
    .default({}),
  facebook: z.object({ owner_name: optionalText }).default({}),
  coach: z.object({ name: z.string().default('Coach') }).default({}),
  targets: z
    .object({
      monthly_revenue: z.number().positive().default(15000),
      programme_price: z.number().positive().default(4000),
    })
    .default({}),
  stale: z.object({ days: z.number().int().min(0).default(3) }).default({}),
  conversion_rates: z
    .object({
      outreach_to_registration: rate(0.08),
      registration_to_day1: rate(0.7),
      day1_to_day2: rate(0.6),
      day2_to_strategy_call: rate(0.4),
      strategy_call_to_sale: rate(0.25),
    })
    .default({}),
});

export type PitwallConfig = z.infer<typeof configSchema>;

/** File each feed is read from when the config does not say otherwise. */
export const DEFAULT_FEED_FILES: Partial<Record<FeedKey, string>> = {
  flow_profile: 'Flow Profile.csv',
  sleep_test: 'Sleep Test.csv',
  mindset_quiz: 'Mindset Quiz.csv',
  race_reviews: 'Race Weekend Review.csv',
  blueprint_registrations: 'Podium Contenders Blueprint Registered.csv',
  xperiencify: 'Xperiencify.csv',
  day1_assessments: '7 Biggest Mistakes Assessment.csv',
  day2_assessments: 'Day 2 Self Assessment.csv',
  strategy_call_applications: 'Strategy Call Application.csv',
  rider_database: 'Rider Database.csv',
  facebook_history: 'Facebook Messenger History.csv',
};

/** The Messenger export has a title line above its header. */
export const DEFAULT_HEADER_ROWS: Partial<Record<FeedKey, number>> = {
  facebook_history: 2,
};

export function parseConfig(raw: unknown, source = 'config'): PitwallConfig {
  const parsed = configSchema.safeParse(expandEnv(raw ?? {}));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`${source}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  return parsed.data;
}

export function parseConfigYaml(text: string, source = 'config.yaml'): PitwallConfig {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (e) {
    throw new ConfigError(`${source}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseConfig(raw, source);
}

export function defaultConfig(): PitwallConfig {
  return parseConfig({});
}
