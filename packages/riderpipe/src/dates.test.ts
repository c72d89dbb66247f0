import { daysBetween, parseDate, parseDateIso, parseEpochMillis } from './dates';

describe('parseDate', () => {
  it('reads day-first dates', () => {
    expect(parseDateIso('05/03/2024')).toBe(new Date(2024, 2, 5).toISOString());
    expect(parseDateIso('05/03/2024 14:30:00')).toBe(new Date(2024, 2, 5, 14, 30, 0).toISOString());
  });

  it('falls back to month-first when day-first cannot apply', () => {
    expect(parseDateIso('03/25/2024')).toBe(new Date(2024, 2, 25).toISOString());
  });

  it('reads ISO dates and timestamps', () => {
    expect(parseDateIso('2024-06-01')).toBe(new Date(2024, 5, 1).toISOString());
    expect(parseDateIso('2024-06-01 09:15:00')).toBe(new Date(2024, 5, 1, 9, 15, 0).toISOString());
    expect(parseDateIso('2024-06-01T09:15:00Z')).toBe('2024-06-01T09:15:00.000Z');
    expect(parseDateIso('2024-06-01T09:15:00.123456+00:00')).toBe('2024-06-01T09:15:00.123Z');
  });

  it('returns null for impossible calendar dates', () => {
    expect(parseDate('31/02/2024')).toBeNull();
  });

  it('returns null for blank or junk input', () => {
    expect(parseDate('')).toBeNull();
    expect(parseDate(undefined)).toBeNull();
    expect(parseDate('next tuesday')).toBeNull();
  });
});

describe('parseEpochMillis', () => {
  it('reads millisecond timestamps', () => {
    expect(parseEpochMillis('1700000000000')?.toISOString()).toBe('2023-11-14T22:13:20.000Z');
  });

  it('rejects non-numeric text', () => {
    expect(parseEpochMillis('yesterday')).toBeNull();
    expect(parseEpochMillis('')).toBeNull();
  });
});

describe('daysBetween', () => {
  it('counts whole days', () => {
    expect(daysBetween('2024-01-01T00:00:00.000Z', new Date('2024-01-04T12:00:00.000Z'))).toBe(3);
  });
});
