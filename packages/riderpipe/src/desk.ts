import { format } from 'date-fns';
import { applyEdit, parseEditRow, type EditEntry, type EditField } from './edits.js';
import { EditRejectedError, RiderNotFoundError } from './errors.js';
import { resolveIdentity } from './identity.js';
import { consoleLogger } from './logger.js';
import { fullName, type RiderRegistry } from './registry.js';
import { resolveStage } from './stages.js';
import { pushRider, type RecordsWriter, type SyncResult } from './sync.js';
import type { Logger, Rider } from './types.js';

/** Where accepted edits are persisted. */
export interface EditSink {
  append(entries: EditEntry[]): void;
}

export interface DeskResult {
  rider: Rider;
  /** Null when no records table is configured. */
  sync: SyncResult | null;
}

export interface NewRider {
  email?: string;
  firstName?: string;
  lastName?: string;
  facebookUrl?: string;
  instagramUrl?: string;
  championship?: string;
  notes?: string;
  followUpDate?: string;
}

/** Look a rider up by exact key, unique key prefix, or exact full name. */
export function findRider(registry: RiderRegistry, query: string): Rider | undefined {
  const q = query.trim().toLowerCase();
  if (!q) return undefined;
  const exact = registry.get(q);
  if (exact) return exact;
  const byPrefix = registry.all().filter((r) => r.key.startsWith(q));
  if (byPrefix.length === 1) return byPrefix[0];
  return registry.findByName(q);
}

/**
 * CRM operations on a reconciled registry. Every change is appended to the
 * edit log, applied to the in-memory rider through the same path the log
 * replay uses, and then pushed to the records table.
 */
export class RiderDesk {
  constructor(
    private registry: RiderRegistry,
    private sink: EditSink,
    private writer: RecordsWriter | null = null,
    private logger: Logger = consoleLogger,
    private clock: () => Date = () => new Date(),
  ) {}

  get(query: string): Rider {
    const rider = findRider(this.registry, query);
    if (!rider) throw new RiderNotFoundError(query);
    return rider;
  }

  async move(query: string, stage: string, opts: { saleValue?: number } = {}): Promise<DeskResult> {
    const target = resolveStage(stage);
    if (!target) throw new EditRejectedError(`unknown stage "${stage}"`);
    const changes: Array<[EditField, string]> = [['stage', target]];
    if (opts.saleValue !== undefined) changes.push(['sale_value', String(opts.saleValue)]);
    return this.commit(this.get(query).key, changes);
  }

  async setField(query: string, field: EditField, value: string): Promise<DeskResult> {
    return this.commit(this.get(query).key, [[field, value]]);
  }

  async addNote(query: string, text: string): Promise<DeskResult> {
    const rider = this.get(query);
    const line = `[${format(this.clock(), 'yyyy-MM-dd')}] ${text.trim()}`;
    const notes = rider.notes ? `${rider.notes}\n${line}` : line;
    return this.commit(rider.key, [['notes', notes]]);
  }

  async setFollowUp(query: string, date: string): Promise<DeskResult> {
    return this.commit(this.get(query).key, [['follow_up_date', date]]);
  }

  async disqualify(query: string, reason: string): Promise<DeskResult> {
    return this.commit(this.get(query).key, [
      ['stage', 'not_a_fit'],
      ['is_disqualified', 'yes'],
      ['disqualification_reason', reason],
    ]);
  }

  /** Register a rider by hand. An existing rider with the same identity is updated instead. */
  async addRider(input: NewRider): Promise<DeskResult> {
    const identity = resolveIdentity(input);
    if (!identity.ok) throw new EditRejectedError(identity.reason);
    const details: Array<[EditField, string]> = [
      ['facebook_url', input.facebookUrl ?? ''],
      ['instagram_url', input.instagramUrl ?? ''],
      ['championship', input.championship ?? ''],
      ['notes', input.notes ?? ''],
      ['follow_up_date', input.followUpDate ?? ''],
    ];
    // Names are always logged, even blank, so replaying the log recreates the rider.
    return this.commit(identity.key, [
      ['first_name', identity.firstName],
      ['last_name', identity.lastName],
      ...details.filter(([, value]) => value.trim() !== ''),
    ]);
  }

  private async commit(key: string, changes: Array<[EditField, string]>): Promise<DeskResult> {
    const timestamp = this.clock().toISOString();
    const entries: EditEntry[] = [];
    for (const [field, value] of changes) {
      const parsed = parseEditRow({ key, timestamp, field, value });
      if (!parsed.ok) throw new EditRejectedError(parsed.reason.replace(/^edit log: /, ''));
      entries.push(parsed.entry);
    }
    this.sink.append(entries);
    const rider = this.registry.getOrCreate(key);
    for (const entry of entries) applyEdit(rider, entry);
    this.logger.info(`[desk] ${fullName(rider) || rider.key}: ${changes.map(([field]) => field).join(', ')} updated`);
    const sync = this.writer ? await pushRider(this.writer, rider, this.logger) : null;
    return { rider, sync };
  }
}
