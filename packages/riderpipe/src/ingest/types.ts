import type { RiderRegistry } from '../registry.js';
import type { ReportBuilder } from '../report.js';
import type { Logger, Rider, Row } from '../types.js';

/** Pipeline phases, in the order they run. */
export type Phase = 'milestone' | 'manual' | 'enrichment' | 'master';

export const PHASES: readonly Phase[] = ['milestone', 'manual', 'enrichment', 'master'];

/** The fetched rows of one source. */
export interface Feed {
  key: string;
  name: string;
  rows: Row[];
}

export interface IngestOptions {
  /** Name of the account that owns the Messenger export; its own thread is ignored. */
  ownerName?: string;
}

export interface IngestContext {
  registry: RiderRegistry;
  report: ReportBuilder;
  logger: Logger;
  now: Date;
  options: IngestOptions;
}

export type RowResult = { ok: true; rider: Rider } | { ok: false; reason: string };

export interface Ingestor {
  key: string;
  phase: Phase;
  ingest(feed: Feed, ctx: IngestContext): void;
}
