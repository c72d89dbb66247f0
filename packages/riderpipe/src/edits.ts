import { parseDate, parseDateIso } from './dates.js';
import { isTruthy, parseAmount, pick, type AliasMap, type NormalizedRow } from './fields.js';
import { normalizeEmail } from './identity.js';
import { applyStage, resolveStage, STAGE_MILESTONES } from './stages.js';
import type { Rider } from './types.js';

export const EDIT_FIELDS = [
  'stage',
  'sale_value',
  'notes',
  'championship',
  'phone',
  'facebook_url',
  'instagram_url',
  'linkedin_url',
  'follow_up_date',
  'is_disqualified',
  'disqualification_reason',
  'tags',
  'first_name',
  'last_name',
] as const;

export type EditField = (typeof EDIT_FIELDS)[number];

export interface EditEntry {
  key: string;
  timestamp: string;
  field: EditField;
  value: string;
}

export type EditParseResult = { ok: true; entry: EditEntry } | { ok: false; reason: string };

export const EDIT_LOG_COLUMNS = ['key', 'timestamp', 'field', 'value'] as const;

const COLUMNS: AliasMap<'key' | 'timestamp' | 'field' | 'value'> = {
  key: ['key', 'identity_key', 'email'],
  timestamp: ['timestamp', 'date', 'updated_at'],
  field: ['field', 'field_name'],
  value: ['value'],
};

/** Older logs carry one column per kind of edit instead of field/value pairs. */
const LEGACY_COLUMNS: ReadonlyArray<[column: string, field: EditField]> = [
  ['stage', 'stage'],
  ['amount', 'sale_value'],
];

function toEditField(raw: string): EditField | null {
  const cleaned = raw.trim().toLowerCase().replace(/[\s-]+/g, '_');
  return EDIT_FIELDS.find((field) => field === cleaned) ?? null;
}

/** Validate one edit-log row. A row that fails is skipped, never fatal. */
export function parseEditRow(row: NormalizedRow): EditParseResult {
  const key = normalizeEmail(pick(row, COLUMNS.key));
  if (!key) return { ok: false, reason: 'edit log: missing key' };
  const timestamp = parseDateIso(pick(row, COLUMNS.timestamp));
  if (!timestamp) return { ok: false, reason: 'edit log: invalid timestamp' };
  let field: EditField | null = null;
  let value = '';
  const named = pick(row, COLUMNS.field);
  if (named) {
    field = toEditField(named);
    value = pick(row, COLUMNS.value);
  } else {
    const legacy = LEGACY_COLUMNS.find(([column]) => row[column]);
    if (legacy) {
      field = legacy[1];
      value = row[legacy[0]];
    }
  }
  if (!field) return { ok: false, reason: 'edit log: unknown field' };

  if (field === 'stage' && !resolveStage(value)) return { ok: false, reason: 'edit log: unknown stage' };
  if (field === 'sale_value' && value && parseAmount(value) === null) {
    return { ok: false, reason: 'edit log: invalid amount' };
  }
  if (field === 'follow_up_date' && value && !parseDate(value)) {
    return { ok: false, reason: 'edit log: invalid follow-up date' };
  }
  return { ok: true, entry: { key, timestamp, field, value } };
}

function textOrNull(value: string): string | null {
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

/**
 * Apply a validated edit. Edits are explicit user intent: stage changes are
 * unconditional and stamp the stage's milestone with the edit time, and text
 * fields may be cleared.
 */
export function applyEdit(rider: Rider, entry: EditEntry): void {
  const { value, timestamp } = entry;
  switch (entry.field) {
    case 'stage': {
      const stage = resolveStage(value);
      if (!stage) return;
      applyStage(rider, stage, 'override');
      const milestone = STAGE_MILESTONES[stage];
      if (milestone) rider.milestones[milestone] = timestamp;
      if (stage === 'not_a_fit') rider.isDisqualified = true;
      return;
    }
    case 'sale_value': {
      const amount = parseAmount(value);
      rider.saleValue = amount;
      if (amount !== null && amount > 0) {
        applyStage(rider, 'client', 'override');
        if (!rider.milestones.saleClosed) rider.milestones.saleClosed = timestamp;
      }
      return;
    }
    case 'follow_up_date':
      rider.followUpDate = parseDateIso(value);
      return;
    case 'is_disqualified':
      rider.isDisqualified = isTruthy(value);
      return;
    case 'disqualification_reason':
      rider.disqualificationReason = textOrNull(value);
      return;
    case 'notes':
      rider.notes = textOrNull(value);
      return;
    case 'championship':
      rider.championship = textOrNull(value);
      return;
    case 'phone':
      rider.phone = textOrNull(value);
      return;
    case 'facebook_url':
      rider.facebookUrl = textOrNull(value);
      return;
    case 'instagram_url':
      rider.instagramUrl = textOrNull(value);
      return;
    case 'linkedin_url':
      rider.linkedinUrl = textOrNull(value);
      return;
    case 'tags':
      rider.tags = value.trim();
      return;
    // Names are never blanked.
    case 'first_name':
      if (value.trim()) rider.firstName = value.trim();
      return;
    case 'last_name':
      if (value.trim()) rider.lastName = value.trim();
      return;
  }
}

/** Stable sort by timestamp; entries with equal times keep log order. */
export function orderEdits(entries: EditEntry[]): EditEntry[] {
  return [...entries].sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
}

export function editToRow(entry: EditEntry): Record<(typeof EDIT_LOG_COLUMNS)[number], string> {
  return { key: entry.key, timestamp: entry.timestamp, field: entry.field, value: entry.value };
}
