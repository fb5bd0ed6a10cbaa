/**
 * Turns the date words people type at a prompt into yyyy-MM-dd.
 * Supports: today, tomorrow, yesterday, relative offsets (+3d/+2w/+1m),
 * weekday names (mon-sunday) and strict ISO dates.
 */

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const RELATIVE_RE = /^\+(\d+)([dwm])$/;

const DAY_MAP: Record<string, number> = {
  sun: 0, sunday: 0,
  mon: 1, monday: 1,
  tue: 2, tuesday: 2,
  wed: 3, wednesday: 3,
  thu: 4, thursday: 4,
  fri: 5, friday: 5,
  sat: 6, saturday: 6,
};

/** Format a Date as yyyy-MM-dd (local time) */
export function formatDate(d: Date): string {
  const y = d.getFullYear();
  const m = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${y}-${m}-${day}`;
}

export function addDays(d: Date, n: number): Date {
  const r = new Date(d);
  r.setDate(r.getDate() + n);
  return r;
}

function addMonths(d: Date, n: number): Date {
  const r = new Date(d);
  r.setMonth(r.getMonth() + n);
  return r;
}

/** True for a strict yyyy-MM-dd string naming a real calendar day (rejects 2026-02-30) */
export function isCalendarDate(input: string): boolean {
  const m = ISO_DATE_RE.exec(input);
  if (!m) return false;

  const year = Number(m[1]);
  const month = Number(m[2]) - 1;
  const day = Number(m[3]);
  const d = new Date(year, month, day);
  d.setFullYear(year, month, day); // the constructor maps years 0-99 to 19xx
  return d.getFullYear() === year && d.getMonth() === month && d.getDate() === day;
}

function tryParseRelative(input: string, today: Date): string | null {
  const m = RELATIVE_RE.exec(input);
  if (!m) return null;

  const count = Number(m[1]);
  switch (m[2]) {
    case 'd': return formatDate(addDays(today, count));
    case 'w': return formatDate(addDays(today, count * 7));
    case 'm': return formatDate(addMonths(today, count));
    default: return null;
  }
}

function tryParseDayOfWeek(input: string, today: Date): string | null {
  const target = DAY_MAP[input];
  if (target === undefined) return null;

  let daysUntil = (target - today.getDay() + 7) % 7;
  if (daysUntil === 0) daysUntil = 7; // same weekday means next week
  return formatDate(addDays(today, daysUntil));
}

/**
 * Parse a date string into yyyy-MM-dd, or null when it can't be understood.
 *
 * @param now - Override "today" for testing
 */
export function parseDate(input: string | null | undefined, now?: Date): string | null {
  const trimmed = input?.trim();
  if (!trimmed) return null;

  const today = new Date(now ?? new Date());
  today.setHours(0, 0, 0, 0);

  const normalized = trimmed.toLowerCase();
  switch (normalized) {
    case 'today': return formatDate(today);
    case 'tomorrow': return formatDate(addDays(today, 1));
    case 'yesterday': return formatDate(addDays(today, -1));
    default:
      return tryParseRelative(normalized, today)
        ?? tryParseDayOfWeek(normalized, today)
        ?? (isCalendarDate(trimmed) ? trimmed : null);
  }
}
