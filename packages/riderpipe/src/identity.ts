export const UNKNOWN_RIDER = 'unknown_rider';

const EMAIL = /^[^\s@]+@[^\s@]+$/;

export interface IdentityInput {
  email?: string;
  firstName?: string;
  lastName?: string;
  fullName?: string;
}

export type IdentityResult =
  | { ok: true; key: string; firstName: string; lastName: string }
  | { ok: false; reason: string };

export const MISSING_IDENTITY = 'missing identity';

export function isPlausibleEmail(value: string): boolean {
  return EMAIL.test(value.trim());
}

export function normalizeEmail(value: string): string {
  return value.trim().toLowerCase();
}

/** Keys derived from a name rather than an email. */
export function isPlaceholderKey(key: string): boolean {
  return !key.includes('@');
}

export function slugify(name: string): string {
  const slug = name
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '_')
    .replace(/[^\p{L}\p{N}_]/gu, '');
  return slug || UNKNOWN_RIDER;
}

export function splitName(fullName: string): { firstName: string; lastName: string } {
  const parts = fullName.trim().split(/\s+/).filter(Boolean);
  return { firstName: parts[0] ?? '', lastName: parts.slice(1).join(' ') };
}

/**
 * Email wins; otherwise the name is slugged into a placeholder key. Two rows
 * only unify by name when their slugs are identical.
 */
export function resolveIdentity(input: IdentityInput): IdentityResult {
  let firstName = (input.firstName ?? '').trim();
  let lastName = (input.lastName ?? '').trim();
  const fullName = (input.fullName ?? '').trim();
  if (!firstName && fullName) {
    const split = splitName(fullName);
    firstName = split.firstName;
    lastName = lastName || split.lastName;
  }

  const email = input.email ?? '';
  if (isPlausibleEmail(email)) {
    return { ok: true, key: normalizeEmail(email), firstName, lastName };
  }

  const name = `${firstName} ${lastName}`.trim();
  if (name) return { ok: true, key: slugify(name), firstName, lastName };
  return { ok: false, reason: MISSING_IDENTITY };
}
