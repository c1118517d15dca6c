/**
 * Calendar-date helpers. Dates without a time component travel as `YYYY-MM-DD`
 * strings; arithmetic happens in UTC so local DST changes never shift a day.
 */

export interface YearMonth {
  year: number;
  /** 1..12 */
  month: number;
}

const ISO_DATE_RE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function pad4(n: number): string {
  return String(n).padStart(4, '0');
}

export function formatLocalDate(date: Date): string {
  return `${pad4(date.getFullYear())}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

function formatUtcDate(date: Date): string {
  return `${pad4(date.getUTCFullYear())}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
}

/**
 * Parse `YYYY-MM-DD` (month and day may be a single digit) into the canonical
 * zero-padded form. Returns null for malformed input or days that do not exist.
 */
export function parseIsoDate(input: string): string | null {
  const match = ISO_DATE_RE.exec(input.trim());
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return null;
  if (day > daysInMonth({ year, month })) return null;
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}`;
}

function toUtc(iso: string): Date {
  const [y = '1970', m = '1', d = '1'] = iso.split('-');
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  // Date.UTC maps years 0..99 onto 1900..1999.
  date.setUTCFullYear(Number(y));
  return date;
}

export function addDays(iso: string, days: number): string {
  const date = toUtc(iso);
  date.setUTCDate(date.getUTCDate() + days);
  return formatUtcDate(date);
}

export function yearMonthOf(iso: string): YearMonth {
  const date = toUtc(iso);
  return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1 };
}

export function shiftYearMonth(ym: YearMonth, delta: number): YearMonth {
  const zeroBased = ym.year * 12 + (ym.month - 1) + delta;
  return { year: Math.floor(zeroBased / 12), month: (zeroBased % 12 + 12) % 12 + 1 };
}

export function compareYearMonth(a: YearMonth, b: YearMonth): number {
  if (a.year !== b.year) return a.year - b.year;
  return a.month - b.month;
}

export function firstOfMonth(ym: YearMonth): string {
  return `${pad4(ym.year)}-${pad2(ym.month)}-01`;
}

export function daysInMonth(ym: YearMonth): number {
  const isLeap = (ym.year % 4 === 0 && ym.year % 100 !== 0) || ym.year % 400 === 0;
  const lengths = [31, isLeap ? 29 : 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];
  return lengths[ym.month - 1] ?? 30;
}

/** 0 = Sunday … 6 = Saturday */
export function weekdayOf(iso: string): number {
  return toUtc(iso).getUTCDay();
}

/** Local calendar day of an ISO timestamp. */
export function localDateOfTimestamp(timestamp: string): string {
  return formatLocalDate(new Date(timestamp));
}

export function formatTimestamp(timestamp: string): string {
  const d = new Date(timestamp);
  return `${formatLocalDate(d)} ${pad2(d.getHours())}:${pad2(d.getMinutes())}`;
}

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;
