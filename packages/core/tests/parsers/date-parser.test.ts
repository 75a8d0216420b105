import { describe, it, expect } from 'vitest';
import {
  parseDate,
  formatDate,
  validateDateFormat,
  convertToDate,
  requireDate,
  isTaskOverdue,
} from '../../src/parsers/date-parser.js';
import { ValidationError } from '../../src/errors.js';

/** Create a fixed "today" date for deterministic tests */
function today(y: number, m: number, d: number): Date {
  return new Date(y, m - 1, d);
}

describe('formatDate', () => {
  it('zero-pads month and day', () => {
    expect(formatDate(today(2026, 3, 7))).toBe('2026-03-07');
  });
});

describe('validateDateFormat', () => {
  it('accepts a missing date', () => {
    expect(validateDateFormat(null)).toBe(true);
    expect(validateDateFormat(undefined)).toBe(true);
  });

  it('accepts real yyyy-MM-dd dates', () => {
    expect(validateDateFormat('2026-02-28')).toBe(true);
    expect(validateDateFormat('2028-02-29')).toBe(true);
  });

  it('rejects impossible calendar dates', () => {
    expect(validateDateFormat('2026-02-30')).toBe(false);
    expect(validateDateFormat('2026-13-01')).toBe(false);
    expect(validateDateFormat('2027-02-29')).toBe(false);
  });

  it('rejects other formats', () => {
    expect(validateDateFormat('2026/01/15')).toBe(false);
    expect(validateDateFormat('15-01-2026')).toBe(false);
    expect(validateDateFormat('2026-1-5')).toBe(false);
    expect(validateDateFormat('')).toBe(false);
    expect(validateDateFormat('tomorrow')).toBe(false);
  });
});

describe('convertToDate', () => {
  it('returns null for null', () => {
    expect(convertToDate(null)).toBeNull();
  });

  it('keeps a plain date', () => {
    expect(convertToDate('2026-05-01')).toBe('2026-05-01');
  });

  it('drops a time component', () => {
    expect(convertToDate('2026-05-01T14:30:00')).toBe('2026-05-01');
  });

  it('throws ValidationError for invalid input', () => {
    expect(() => convertToDate('not-a-date')).toThrow(ValidationError);
    expect(() => convertToDate('2026-02-30')).toThrow('Invalid date format: 2026-02-30');
    expect(() => convertToDate('')).toThrow(ValidationError);
  });
});

describe('requireDate', () => {
  it('returns a valid date unchanged', () => {
    expect(requireDate('2026-01-15')).toBe('2026-01-15');
  });

  it('rejects a date with a time part', () => {
    expect(() => requireDate('2026-01-15T10:00')).toThrow(ValidationError);
  });
});

describe('isTaskOverdue', () => {
  const todayStr = '2026-06-15';

  it('is false without a due date', () => {
    expect(isTaskOverdue(null, false, todayStr)).toBe(false);
    expect(isTaskOverdue('', false, todayStr)).toBe(false);
  });

  it('is true for a past date on an open task', () => {
    expect(isTaskOverdue('2026-06-14', false, todayStr)).toBe(true);
  });

  it('is false for a completed task', () => {
    expect(isTaskOverdue('2026-06-14', true, todayStr)).toBe(false);
  });

  it('is false for today and the future', () => {
    expect(isTaskOverdue('2026-06-15', false, todayStr)).toBe(false);
    expect(isTaskOverdue('2026-06-16', false, todayStr)).toBe(false);
  });

  it('is false for an unparseable date', () => {
    expect(isTaskOverdue('someday', false, todayStr)).toBe(false);
  });
});

describe('parseDate', () => {
  const fixed = today(2026, 2, 8); // Sunday Feb 8 2026

  it('returns null for empty/null/undefined', () => {
    expect(parseDate(null)).toBeNull();
    expect(parseDate(undefined)).toBeNull();
    expect(parseDate('')).toBeNull();
    expect(parseDate('  ')).toBeNull();
  });

  it('parses named dates', () => {
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
    expect(parseDate('sun', fixed)).toBe('2026-02-15'); // today is Sunday -> next week
  });

  it('parses month+day, rolling past dates into next year', () => {
    expect(parseDate('mar15', fixed)).toBe('2026-03-15');
    expect(parseDate('jan3', fixed)).toBe('2027-01-03');
    expect(parseDate('feb30', fixed)).toBeNull();
  });

  it('parses ISO dates', () => {
    expect(parseDate('2026-12-31', fixed)).toBe('2026-12-31');
    expect(parseDate('2026-12-31T08:00', fixed)).toBe('2026-12-31');
    expect(parseDate('2026-02-30', fixed)).toBeNull();
  });

  it('does not mutate the reference date', () => {
    const ref = new Date(2026, 1, 8, 15, 45);
    parseDate('today', ref);
    expect(ref.getHours()).toBe(15);
  });

  it('returns null for gibberish', () => {
    expect(parseDate('next blue moon', fixed)).toBeNull();
  });

  it.each(['constructor', '__proto__', 'toString'])('returns null for object built-in name %j', (input) => {
    expect(parseDate(input, fixed)).toBeNull();
  });
});
