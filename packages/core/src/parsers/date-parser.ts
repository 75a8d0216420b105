/**
 * Date handling for due dates. All dates are local calendar dates in
 * yyyy-MM-dd form, which also makes plain string comparison chronological.
 *
 * parseDate() accepts human-friendly input for the command line: today,
 * tomorrow, yesterday, relative (+3d/+2w/+1m), day-of-week names (mon-sunday),
 * month+day (jan15), and ISO format.
 */

import { ValidationError } from '../errors.js';

const RELATIVE_RE = /^\+(\d+)([dwm])$/;
const MONTH_DAY_RE = /^(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)(\d{1,2})$/;

/** yyyy-MM-dd pattern */
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

const DAY_MAP: Record<string, number> = {
  sun: 0, sunday: 0,
  mon: 1, monday: 1,
  tue: 2, tuesday: 2,
  wed: 3, wednesday: 3,
  thu: 4, thursday: 4,
  fri: 5, friday: 5,
  sat: 6, saturday: 6,
};

const MONTH_MAP: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3,
  may: 4, jun: 5, jul: 6, aug: 7,
  sep: 8, oct: 9, nov: 10, dec: 11,
};

/** Format a Date as yyyy-MM-dd */
export function formatDate(d: Date): string {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

/** Today's local date as yyyy-MM-dd */
export function todayString(now: Date = new Date()): string {
  return formatDate(now);
}

/** Add days to a date (returns new Date) */
export function addDays(d: Date, n: number): Date {
  const r = new Date(d);
  r.setDate(r.getDate() + n);
  return r;
}

/** Add months to a date (returns new Date) */
function addMonths(d: Date, n: number): Date {
  const r = new Date(d);
  r.setMonth(r.getMonth() + n);
  return r;
}

/** True for a yyyy-MM-dd string naming a real calendar day (rejects 2026-02-30) */
function isCalendarDate(input: string): boolean {
  if (!ISO_DATE_RE.test(input)) return false;
  const [y, m, d] = input.split('-').map(Number);
  if (y === undefined || m === undefined || d === undefined) return false;
  const date = new Date(y, m - 1, d);
  return date.getFullYear() === y && date.getMonth() === m - 1 && date.getDate() === d;
}

/**
 * Check that a value is a valid yyyy-MM-dd date.
 * A missing value counts as valid: it means "no due date".
 */
export function validateDateFormat(value: string | null | undefined): boolean {
  if (value == null) return true;
  return isCalendarDate(value);
}

/**
 * Normalize a due date to yyyy-MM-dd. A trailing time part
 * (2026-03-01T09:30) is dropped.
 */
export function convertToDate(value: string | null | undefined): string | null {
  if (value == null) return null;
  const datePart = value.trim().split('T')[0] ?? '';
  if (!isCalendarDate(datePart)) {
    throw new ValidationError(`Invalid date format: ${value}. Expected format: YYYY-MM-DD`, { value });
  }
  return datePart;
}

/** Validate a query date argument, which must be exactly yyyy-MM-dd */
export function requireDate(value: string): string {
  if (!isCalendarDate(value)) {
    throw new ValidationError(`Invalid date format: ${value}. Expected: YYYY-MM-DD`, { value });
  }
  return value;
}

/**
 * A task is overdue when it has a due date strictly before today and is
 * not completed. Unparseable dates are never overdue.
 */
export function isTaskOverdue(
  dueDate: string | null | undefined,
  completed: boolean,
  today: string = todayString(),
): boolean {
  if (!dueDate || completed) return false;
  if (!isCalendarDate(dueDate)) return false;
  return dueDate < today;
}

function tryParseRelative(input: string, today: Date): string | null {
  const m = RELATIVE_RE.exec(input);
  if (!m) return null;

  const count = parseInt(m[1] ?? '0', 10);
  switch (m[2]) {
    case 'd': return formatDate(addDays(today, count));
    case 'w': return formatDate(addDays(today, count * 7));
    case 'm': return formatDate(addMonths(today, count));
    default: return null;
  }
}

function tryParseDayOfWeek(input: string, today: Date): string | null {
  if (!Object.hasOwn(DAY_MAP, input)) return null;
  const target = DAY_MAP[input];
  if (target === undefined) return null;

  let daysUntil = (target - today.getDay() + 7) % 7;
  if (daysUntil === 0) daysUntil = 7; // Next week if today
  return formatDate(addDays(today, daysUntil));
}

function tryParseMonthDay(input: string, today: Date): string | null {
  const m = MONTH_DAY_RE.exec(input);
  if (!m) return null;

  const name = m[1] ?? '';
  const month = Object.hasOwn(MONTH_MAP, name) ? MONTH_MAP[name] : undefined;
  if (month === undefined) return null;
  const day = parseInt(m[2] ?? '0', 10);

  const candidate = new Date(today.getFullYear(), month, day);
  if (candidate.getMonth() !== month || candidate.getDate() !== day) {
    return null; // e.g. feb30
  }

  // A date already past this year means next year
  if (formatDate(candidate) < formatDate(today)) {
    candidate.setFullYear(candidate.getFullYear() + 1);
  }
  return formatDate(candidate);
}

function tryParseStandard(input: string): string | null {
  try {
    return convertToDate(input);
  } catch (err: unknown) {
    if (err instanceof ValidationError) return null;
    throw err;
  }
}

/**
 * Parse a human-friendly date string into yyyy-MM-dd format.
 * Returns null if the input can't be parsed.
 *
 * @param input - Date string (e.g. "today", "+3d", "friday", "jan15", "2026-03-01")
 * @param now - Override "today" for testing. Defaults to current date.
 */
export function parseDate(input: string | null | undefined, now?: Date): string | null {
  if (!input?.trim()) return null;

  const today = new Date(now ?? new Date());
  today.setHours(0, 0, 0, 0);

  const normalized = input.trim().toLowerCase();

  switch (normalized) {
    case 'today': return formatDate(today);
    case 'tomorrow': return formatDate(addDays(today, 1));
    case 'yesterday': return formatDate(addDays(today, -1));
    default:
      return tryParseRelative(normalized, today)
        ?? tryParseDayOfWeek(normalized, today)
        ?? tryParseMonthDay(normalized, today)
        ?? tryParseStandard(input.trim());
  }
}
