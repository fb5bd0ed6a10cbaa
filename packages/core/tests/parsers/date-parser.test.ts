import { describe, it, expect } from 'vitest';
import { parseDate, isCalendarDate, formatDate } from '../../src/parsers/date-parser.js';

/** Fixed local "today" for deterministic tests */
function day(y: number, m: number, d: number): Date {
  return new Date(y, m - 1, d);
}

describe('parseDate', () => {
  const sunday = day(2026, 2, 8);

  it('returns null for blank input', () => {
    expect(parseDate(null)).toBeNull();
    expect(parseDate(undefined)).toBeNull();
    expect(parseDate('   ')).toBeNull();
  });

  it('parses named days case-insensitively', () => {
    expect(parseDate('today', sunday)).toBe('2026-02-08');
    expect(parseDate('Tomorrow', sunday)).toBe('2026-02-09');
    expect(parseDate('YESTERDAY', sunday)).toBe('2026-02-07');
  });

  it('parses relative offsets', () => {
    expect(parseDate('+3d', sunday)).toBe('2026-02-11');
    expect(parseDate('+2w', sunday)).toBe('2026-02-22');
    expect(parseDate('+1m', sunday)).toBe('2026-03-08');
  });

  it('resolves weekday names to the next occurrence', () => {
    expect(parseDate('mon', sunday)).toBe('2026-02-09');
    expect(parseDate('friday', sunday)).toBe('2026-02-13');
    expect(parseDate('sunday', sunday)).toBe('2026-02-15');
  });

  it('accepts strict ISO dates', () => {
    expect(parseDate('2026-12-31', sunday)).toBe('2026-12-31');
    expect(parseDate(' 2024-02-29 ', sunday)).toBe('2024-02-29');
  });

  it('rejects impossible and malformed dates', () => {
    expect(parseDate('2026-02-30', sunday)).toBeNull();
    expect(parseDate('2026-13-01', sunday)).toBeNull();
    expect(parseDate('31/12/2026', sunday)).toBeNull();
    expect(parseDate('someday', sunday)).toBeNull();
  });

  it('does not modify the date passed as now', () => {
    const now = new Date(2026, 1, 8, 15, 30);
    parseDate('tomorrow', now);
    expect(now.getHours()).toBe(15);
  });
});

describe('isCalendarDate', () => {
  it('checks the yyyy-MM-dd form and the calendar', () => {
    expect(isCalendarDate('2026-01-31')).toBe(true);
    expect(isCalendarDate('2025-02-29')).toBe(false);
    expect(isCalendarDate('2026-1-31')).toBe(false);
    expect(isCalendarDate('2026-01-31T00:00:00Z')).toBe(false);
  });

  it('handles years below 100', () => {
    expect(isCalendarDate('0099-12-31')).toBe(true);
    expect(isCalendarDate('0004-02-29')).toBe(true);
    expect(isCalendarDate('0003-02-29')).toBe(false);
  });
});

describe('formatDate', () => {
  it('zero-pads month and day', () => {
    expect(formatDate(day(2026, 3, 5))).toBe('2026-03-05');
  });
});
