import type { RecordsClient } from '@pitwall/records-client';
import type { PitwallConfig } from './config.js';
import { RiderDesk, type EditSink } from './desk.js';
import { consoleLogger } from './logger.js';
import { loadRiders, type Reconciliation } from './pipeline.js';
import { recordsClientFor, resolveSources } from './sources.js';
import { appendEdits, loadConfig, storePaths, type StorePaths } from './store.js';
import type { Logger } from './types.js';

/** A reconciled registry plus everything needed to edit and sync it. */
export interface Session extends Reconciliation {
  config: PitwallConfig;
  paths: StorePaths;
  desk: RiderDesk;
  records: RecordsClient | null;
}

export interface SessionOptions {
  paths?: StorePaths;
  logger?: Logger;
  now?: Date;
  /** Overrides the client built from config; null disables the records table. */
  recordsClient?: RecordsClient | null;
}

/** Sink that appends accepted edits to the store's edit log. */
export function fileSink(paths: StorePaths): EditSink {
  return { append: (entries) => appendEdits(entries, paths) };
}

export async function loadSession(opts: SessionOptions = {}): Promise<Session> {
  const paths = opts.paths ?? storePaths();
  const logger = opts.logger ?? consoleLogger;
  const config = loadConfig(paths);
  const records = opts.recordsClient === undefined ? recordsClientFor(config, logger) : opts.recordsClient;
  const sources = resolveSources(config, { baseDir: paths.root, editLog: paths.editLog, logger, recordsClient: records });
  const { registry, report } = await loadRiders(sources, {
    logger,
    now: opts.now,
    ownerName: config.facebook.owner_name,
  });
  const desk = new RiderDesk(registry, fileSink(paths), records, logger);
  return { registry, report, config, paths, desk, records };
}
