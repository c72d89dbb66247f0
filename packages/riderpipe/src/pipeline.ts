import { INGESTORS, orderByPhase } from './ingest/index.js';
import type { IngestContext, IngestOptions, Ingestor } from './ingest/types.js';
import { consoleLogger } from './logger.js';
import { RiderRegistry } from './registry.js';
import { ReportBuilder, type LoadReport } from './report.js';
import type { FeedSource } from './sources.js';
import type { Logger, Row } from './types.js';

/** The outcome of fetching one source. `rows` is null when the fetch failed. */
export interface FeedLoad {
  key: string;
  name: string;
  rows: Row[] | null;
  error?: string;
}

export interface ReconcileOptions extends IngestOptions {
  logger?: Logger;
  now?: Date;
  /** Defaults to every built-in ingestor. Run in phase order whatever the list order. */
  ingestors?: readonly Ingestor[];
}

export interface Reconciliation {
  registry: RiderRegistry;
  report: LoadReport;
}

/**
 * Fetch every source concurrently and wait for all of them. A source that
 * fails comes back with `rows: null` instead of failing the batch.
 */
export async function fetchFeeds(sources: FeedSource[], logger: Logger = consoleLogger): Promise<FeedLoad[]> {
  const settled = await Promise.allSettled(sources.map((source) => source.fetch()));
  return settled.map((outcome, i): FeedLoad => {
    const { key, name } = sources[i];
    if (outcome.status === 'fulfilled') return { key, name, rows: outcome.value };
    const error = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
    logger.warn(`[pipeline] ${name}: fetch failed, treating as absent (${error})`);
    return { key, name, rows: null, error };
  });
}

/**
 * Build a fresh registry from fetched feeds. Ingestors run in a fixed order
 * (milestone feeds, the edit log, enrichment scans, then the master table)
 * and each feed is isolated: one that throws is recorded as failed and the
 * run continues.
 */
export function reconcile(loads: FeedLoad[], options: ReconcileOptions = {}): Reconciliation {
  const logger = options.logger ?? consoleLogger;
  const registry = new RiderRegistry();
  const report = new ReportBuilder();
  const ctx: IngestContext = {
    registry,
    report,
    logger,
    now: options.now ?? new Date(),
    options: { ownerName: options.ownerName },
  };

  const ingestors = orderByPhase(options.ingestors ?? INGESTORS);
  const known = new Set(ingestors.map((ingestor) => ingestor.key));
  for (const load of loads) {
    if (!known.has(load.key)) logger.warn(`[pipeline] ${load.name}: no ingestor for feed "${load.key}"`);
  }

  for (const ingestor of ingestors) {
    const feeds = loads.filter((load) => load.key === ingestor.key);
    if (feeds.length === 0) {
      report.absent(ingestor.key);
      continue;
    }
    for (const load of feeds) {
      if (load.rows === null) {
        report.absent(ingestor.key, load.name, load.error);
        continue;
      }
      report.beginFeed(ingestor.key, load.name);
      try {
        ingestor.ingest({ key: load.key, name: load.name, rows: load.rows }, ctx);
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        logger.error(`[pipeline] ${load.name}: ingestion failed (${message})`);
        report.failed(message);
      }
    }
  }

  const result = report.build();
  logger.info(
    `[pipeline] ${registry.size} riders from ${result.rowsLoaded}/${result.totalRowsSeen} rows (${result.rowsSkipped} skipped)`,
  );
  return { registry, report: result };
}

/** Fetch, then reconcile. Reconciliation never starts before every fetch settles. */
export async function loadRiders(sources: FeedSource[], options: ReconcileOptions = {}): Promise<Reconciliation> {
  const loads = await fetchFeeds(sources, options.logger);
  return reconcile(loads, options);
}
