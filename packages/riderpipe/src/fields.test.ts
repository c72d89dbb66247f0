import { assign, cellText, fill, isTruthy, normalizeRow, parseAmount, parseScore, pick, pickWhere } from './fields';
import { createRider } from './registry';

describe('normalizeRow', () => {
  it('lowercases and trims headers and renders cells as text', () => {
    expect(normalizeRow({ ' First Name ': ' Jane ', Score: 42, Paid: true, Tags: ['a', '', 'b'], Empty: null })).toEqual({
      'first name': 'Jane',
      score: '42',
      paid: 'true',
      tags: 'a,b',
      empty: '',
    });
  });

  it('keeps the first non-blank value when headers collide', () => {
    expect(normalizeRow({ Email: 'a@example.com', email: 'b@example.com' })).toEqual({ email: 'a@example.com' });
    expect(normalizeRow({ Email: '', email: 'b@example.com' })).toEqual({ email: 'b@example.com' });
  });

  it('drops blank header names', () => {
    expect(normalizeRow({ '': 'x', ' ': 'y', name: 'z' })).toEqual({ name: 'z' });
  });
});

describe('cellText', () => {
  it('renders non-finite numbers and objects as blank', () => {
    expect(cellText(Number.NaN)).toBe('');
    expect(cellText({ url: 'x' })).toBe('');
  });
});

describe('pick', () => {
  it('tries aliases in order and skips blank cells', () => {
    const row = { 'full name': '', name: 'Jane Doe', rider: 'J. Doe' };
    expect(pick(row, ['full name', 'name', 'rider'])).toBe('Jane Doe');
    expect(pick(row, ['missing'])).toBe('');
  });
});

describe('pickWhere', () => {
  it('returns the first non-blank matching column', () => {
    const row = { 'facebook id': '', 'facebook url': 'https://facebook.com/jane' };
    expect(pickWhere(row, (c) => c.includes('facebook'))).toBe('https://facebook.com/jane');
  });
});

describe('isTruthy', () => {
  it('accepts the usual yes values', () => {
    expect(['Yes', 'y', 'TRUE', '1'].map(isTruthy)).toEqual([true, true, true, true]);
    expect(['no', '', '0', 'maybe'].map(isTruthy)).toEqual([false, false, false, false]);
  });
});

describe('parseAmount', () => {
  it('strips currency symbols and separators', () => {
    expect(parseAmount('£4,000')).toBe(4000);
    expect(parseAmount(' $1,250.50 ')).toBe(1250.5);
    expect(parseAmount('€ 900')).toBe(900);
  });

  it('returns null for blank or non-numeric input', () => {
    expect(parseAmount('')).toBeNull();
    expect(parseAmount('four grand')).toBeNull();
  });
});

describe('parseScore', () => {
  it('parses numbers and rejects text', () => {
    expect(parseScore('87')).toBe(87);
    expect(parseScore('')).toBeNull();
    expect(parseScore('n/a')).toBeNull();
  });
});

describe('assign and fill', () => {
  it('assign overwrites with non-blank values only', () => {
    const rider = createRider('a@example.com');
    assign(rider, 'phone', '07700 900000');
    assign(rider, 'phone', '');
    assign(rider, 'phone', null);
    expect(rider.phone).toBe('07700 900000');
    assign(rider, 'phone', '07700 900001');
    expect(rider.phone).toBe('07700 900001');
  });

  it('fill only writes into an empty field', () => {
    const rider = createRider('a@example.com');
    fill(rider, 'country', 'UK');
    fill(rider, 'country', 'IE');
    expect(rider.country).toBe('UK');
  });
});
