import { INITIAL_STAGE } from './stages.js';
import type { Rider } from './types.js';

export function createRider(key: string, firstName = '', lastName = ''): Rider {
  return {
    key,
    firstName,
    lastName,
    phone: null,
    facebookUrl: null,
    instagramUrl: null,
    linkedinUrl: null,
    championship: null,
    notes: null,
    country: null,
    riderType: null,
    stage: INITIAL_STAGE,
    milestones: {},
    saleValue: null,
    isDisqualified: false,
    disqualificationReason: null,
    followUpDate: null,
    tags: '',
    outreachChannel: null,
    scores: { day1: null, day2: {}, flowProfile: null, sleep: null, mindset: null },
    flowProfileResult: null,
    flowProfileUrl: null,
    mindsetResult: null,
    biggestMistake: null,
  };
}

export function fullName(rider: Rider): string {
  return `${rider.firstName} ${rider.lastName}`.trim();
}

/** One record per identity key for the lifetime of a reconciliation run. */
export class RiderRegistry {
  private riders = new Map<string, Rider>();

  getOrCreate(key: string, firstName = '', lastName = ''): Rider {
    const existing = this.riders.get(key);
    if (!existing) {
      const rider = createRider(key, firstName.trim(), lastName.trim());
      this.riders.set(key, rider);
      return rider;
    }
    if (!existing.firstName && firstName.trim()) existing.firstName = firstName.trim();
    if (!existing.lastName && lastName.trim()) existing.lastName = lastName.trim();
    return existing;
  }

  get(key: string): Rider | undefined {
    return this.riders.get(key);
  }

  has(key: string): boolean {
    return this.riders.has(key);
  }

  get size(): number {
    return this.riders.size;
  }

  all(): Rider[] {
    return [...this.riders.values()];
  }

  /** Exact, case-insensitive match on "first last". */
  findByName(name: string): Rider | undefined {
    const wanted = name.trim().toLowerCase();
    if (!wanted) return undefined;
    for (const rider of this.riders.values()) {
      if (fullName(rider).toLowerCase() === wanted) return rider;
    }
    return undefined;
  }
}
