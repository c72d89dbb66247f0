import { format } from 'date-fns';
import type { RecordFields, UpsertResult } from '@pitwall/records-client';
import { isPlaceholderKey } from './identity.js';
import { fullName } from './registry.js';
import { STAGE_LABELS } from './stages.js';
import type { Logger, Rider } from './types.js';
import { consoleLogger } from './logger.js';

/** The part of the records client that sync needs. */
export interface RecordsWriter {
  upsertRecord(fields: RecordFields): Promise<UpsertResult>;
}

export type SyncResult =
  | { ok: true; key: string; action: UpsertResult['action']; droppedFields: string[] }
  | { ok: false; key: string; error: string };

function day(iso: string | undefined | null): string | null {
  return iso ? format(new Date(iso), 'yyyy-MM-dd') : null;
}

/** Render a rider in the records table's column names. */
export function toRecordFields(rider: Rider): RecordFields {
  const tags = rider.tags.split(',').map((t) => t.trim()).filter(Boolean);
  return {
    'Email': isPlaceholderKey(rider.key) ? null : rider.key,
    'Full Name': fullName(rider) || null,
    'First Name': rider.firstName || null,
    'Last Name': rider.lastName || null,
    'Phone Number': rider.phone,
    'FB URL': rider.facebookUrl,
    'IG URL': rider.instagramUrl,
    'Tags': tags.length ? tags : null,
    'Overall Score': rider.scores.day1,
    'Biggest Mistake': rider.biggestMistake,
    'Date Blueprint Started': day(rider.milestones.registered),
    'Date Day 1': day(rider.milestones.day1Complete),
    'Stage': STAGE_LABELS[rider.stage],
    'Notes': rider.notes,
    'Championship': rider.championship,
    'Follow Up Date': day(rider.followUpDate),
    'Revenue': rider.saleValue,
  };
}

/**
 * Write one rider back to the records table. Failures are returned, never
 * thrown, and the in-memory rider is left as it is.
 */
export async function pushRider(writer: RecordsWriter, rider: Rider, logger: Logger = consoleLogger): Promise<SyncResult> {
  try {
    const result = await writer.upsertRecord(toRecordFields(rider));
    return { ok: true, key: rider.key, action: result.action, droppedFields: result.droppedFields };
  } catch (e) {
    const error = e instanceof Error ? e.message : String(e);
    logger.warn(`[sync] ${rider.key}: push failed (${error})`);
    return { ok: false, key: rider.key, error };
  }
}

export interface BulkSyncResult {
  pushed: number;
  failed: SyncResult[];
}

/** Push riders one at a time. */
export async function pushAll(writer: RecordsWriter, riders: Rider[], logger: Logger = consoleLogger): Promise<BulkSyncResult> {
  const failed: SyncResult[] = [];
  let pushed = 0;
  for (const rider of riders) {
    const result = await pushRider(writer, rider, logger);
    if (result.ok) pushed++;
    else failed.push(result);
  }
  logger.info(`[sync] pushed ${pushed}/${riders.length} riders`);
  return { pushed, failed };
}
