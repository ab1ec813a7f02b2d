const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MONTH_KEY_RE = /^(\d{4})-(\d{2})$/;

type DateParts = { year: number; month: number; day: number };

function splitIsoDate(value: string): DateParts {
  const match = value.match(ISO_DATE_RE);
  if (!match) {
    throw new Error(`Invalid ISO date: ${value}`);
  }
  return {
    year: Number.parseInt(match[1], 10),
    month: Number.parseInt(match[2], 10),
    day: Number.parseInt(match[3], 10),
  };
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function formatParts(year: number, month: number, day: number): string {
  const yearStr = String(year).padStart(4, "0");
  const monthStr = String(month).padStart(2, "0");
  const dayStr = String(day).padStart(2, "0");
  return `${yearStr}-${monthStr}-${dayStr}`;
}

/**
 * Calendar month offset. The day is clamped to the end of the target month,
 * so 2024-01-31 + 1 month is 2024-02-29.
 */
export function addMonths(date: string, months: number): string {
  const { year, month, day } = splitIsoDate(date);
  const total = year * 12 + (month - 1) + months;
  const nextYear = Math.floor(total / 12);
  const nextMonth = total - nextYear * 12 + 1;
  const clampedDay = Math.min(day, daysInMonth(nextYear, nextMonth));
  return formatParts(nextYear, nextMonth, clampedDay);
}

export function addDays(date: string, days: number): string {
  const { year, month, day } = splitIsoDate(date);
  const shifted = new Date(Date.UTC(year, month - 1, day + days));
  return formatParts(shifted.getUTCFullYear(), shifted.getUTCMonth() + 1, shifted.getUTCDate());
}

export function daysBetween(from: string, to: string): number {
  const a = splitIsoDate(from);
  const b = splitIsoDate(to);
  const diffMs = Date.UTC(b.year, b.month - 1, b.day) - Date.UTC(a.year, a.month - 1, a.day);
  return Math.round(diffMs / 86_400_000);
}

export function toMonthKey(date: string): string {
  return date.slice(0, 7);
}

export function monthKeyToDate(monthKey: string): string {
  if (!MONTH_KEY_RE.test(monthKey)) {
    throw new Error(`Invalid month key: ${monthKey}`);
  }
  return `${monthKey}-01`;
}

export function addMonthsToKey(monthKey: string, months: number): string {
  return toMonthKey(addMonths(monthKeyToDate(monthKey), months));
}

/** Whole calendar months from `from` to `to`, ignoring the day of month. */
export function calendarMonthsBetween(from: string, to: string): number {
  const a = splitIsoDate(from);
  const b = splitIsoDate(to);
  return (b.year - a.year) * 12 + (b.month - a.month);
}

export function maxDate(dates: Iterable<string>): string | null {
  let latest: string | null = null;
  for (const date of dates) {
    if (!latest || date > latest) latest = date;
  }
  return latest;
}

/** Half-open range check: start <= date < end. */
export function inRange(date: string, start: string, end: string): boolean {
  return date >= start && date < end;
}
