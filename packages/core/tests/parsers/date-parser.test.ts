import { describe, it, expect } from 'vitest';
import { parseDate, toDeadline } from '../../src/parsers/date-parser.js';

/** Create a fixed "today" date for deterministic tests */
function today(y: number, m: number, d: number): Date {
  return new Date(y, m - 1, d);
}

describe('parseDate', () => {
  const fixed = today(2026, 2, 8); // Sunday Feb 8 2026

  it('returns null for empty/null/undefined', () => {
    expect(parseDate(null)).toBeNull();
    expect(parseDate(undefined)).toBeNull();
    expect(parseDate('')).toBeNull();
    expect(parseDate('  ')).toBeNull();
  });

  it('parses named dates case-insensitively', () => {
    expect(parseDate('today', fixed)).toBe('2026-02-08');
    expect(parseDate('Tomorrow', fixed)).toBe('2026-02-09');
    expect(parseDate('YESTERDAY', fixed)).toBe('2026-02-07');
  });

  it('parses relative offsets', () => {
    expect(parseDate('+3d', fixed)).toBe('2026-02-11');
    expect(parseDate('+2w', fixed)).toBe('2026-02-22');
    expect(parseDate('+1m', fixed)).toBe('2026-03-08');
  });

  it('parses day-of-week names as the next occurrence', () => {
    expect(parseDate('mon', fixed)).toBe('2026-02-09');
    expect(parseDate('friday', fixed)).toBe('2026-02-13');
    // Today is Sunday, so "sunday" is next week
    expect(parseDate('sun', fixed)).toBe('2026-02-15');
  });

  it('parses monthDD and rolls past dates to next year', () => {
    expect(parseDate('mar15', fixed)).toBe('2026-03-15');
    expect(parseDate('jan1', fixed)).toBe('2027-01-01');
    expect(parseDate('feb30', fixed)).toBeNull();
  });

  it('parses yyyy-MM-dd and rejects rolled-over dates', () => {
    expect(parseDate('2026-03-01', fixed)).toBe('2026-03-01');
    expect(parseDate('2026-02-30', fixed)).toBeNull();
    expect(parseDate('2026-13-01', fixed)).toBeNull();
    expect(parseDate('not-a-date', fixed)).toBeNull();
  });

  it('does not modify the date passed as now', () => {
    const now = new Date(2026, 1, 8, 15, 30);
    parseDate('today', now);
    expect(now.getHours()).toBe(15);
    expect(now.getMinutes()).toBe(30);
  });
});

describe('toDeadline', () => {
  const fixed = today(2026, 2, 8);

  it('returns null for blank or unparseable input', () => {
    expect(toDeadline(undefined)).toBeNull();
    expect(toDeadline('   ')).toBeNull();
    expect(toDeadline('someday', fixed)).toBeNull();
  });

  it('maps a plain date to the end of that local day', () => {
    expect(toDeadline('tomorrow', fixed)).toBe(new Date(2026, 1, 9, 23, 59, 59, 999).toISOString());
    expect(toDeadline('2026-03-01', fixed)).toBe(new Date(2026, 2, 1, 23, 59, 59, 999).toISOString());
  });

  it('passes full timestamps through in canonical form', () => {
    expect(toDeadline('2026-03-01T10:00:00Z')).toBe('2026-03-01T10:00:00.000Z');
  });

  it('rejects timestamps Date cannot read', () => {
    expect(toDeadline('2026-03-01T99:00')).toBeNull();
  });
});
