import { isValid, parse, parseISO } from 'date-fns';

const FORMATS = [
  'dd/MM/yyyy HH:mm:ss',
  'yyyy-MM-dd HH:mm:ss',
  'yyyy-MM-dd',
  'dd/MM/yyyy',
  'MM/dd/yyyy HH:mm:ss',
  'MM/dd/yyyy',
  "yyyy-MM-dd'T'HH:mm:ss.SSSX",
  "yyyy-MM-dd'T'HH:mm:ssX",
  "yyyy-MM-dd'T'HH:mm:ss.SSS",
  "yyyy-MM-dd'T'HH:mm:ss",
];

const ISO_LIKE = /^\d{4}-\d{2}-\d{2}T/;

/**
 * Parse a date from any of the export formats seen in the feeds. Day-first
 * formats are tried before US ones. Returns null for blank or unparseable
 * input; never throws.
 */
export function parseDate(raw: string | null | undefined): Date | null {
  const value = (raw ?? '').trim();
  if (!value) return null;
  const reference = new Date();
  for (const format of FORMATS) {
    const date = parse(value, format, reference);
    if (isValid(date)) return date;
  }
  // Longer fractional seconds or numeric offsets.
  if (ISO_LIKE.test(value)) {
    const date = parseISO(value);
    if (isValid(date)) return date;
  }
  return null;
}

/** Same as `parseDate`, rendered as an ISO timestamp. */
export function parseDateIso(raw: string | null | undefined): string | null {
  const date = parseDate(raw);
  return date ? date.toISOString() : null;
}

export function parseEpochMillis(raw: string): Date | null {
  const value = raw.trim();
  if (!/^\d+(\.\d+)?$/.test(value)) return null;
  const date = new Date(Number(value));
  return isValid(date) ? date : null;
}

export function daysBetween(fromIso: string, to: Date): number {
  return Math.floor((to.getTime() - new Date(fromIso).getTime()) / 86400000);
}
