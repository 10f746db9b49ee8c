const MS_PER_DAY = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * Check that a string is a real calendar date in YYYY-MM-DD form
 */
export function isValidDateStr(dateStr: string): boolean {
  const match = DATE_PATTERN.exec(dateStr);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return formatDateStr(date) === dateStr;
}

export function isValidTimeStr(timeStr: string): boolean {
  return TIME_PATTERN.test(timeStr);
}

/**
 * Parse a date string (YYYY-MM-DD) into a Date at UTC midnight.
 * Day arithmetic is done in UTC so DST changes never shift a day.
 */
export function parseDateStr(dateStr: string): Date {
  const [year, month, day] = dateStr.split('-').map(Number);
  return new Date(Date.UTC(year, month - 1, day));
}

/**
 * Format a UTC Date to YYYY-MM-DD
 */
export function formatDateStr(date: Date): string {
  const year = String(date.getUTCFullYear()).padStart(4, '0');
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Calendar date of a timestamp in the local time zone
 */
export function formatLocalDateStr(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Whole days from `from` to `to`; negative when `to` is earlier
 */
export function daysBetween(from: string, to: string): number {
  return Math.round((parseDateStr(to).getTime() - parseDateStr(from).getTime()) / MS_PER_DAY);
}

export function addDays(dateStr: string, days: number): string {
  const date = parseDateStr(dateStr);
  date.setUTCDate(date.getUTCDate() + days);
  return formatDateStr(date);
}

/**
 * Day of week (0=Sunday, 6=Saturday)
 */
export function getDayOfWeek(dateStr: string): number {
  return parseDateStr(dateStr).getUTCDay();
}

export function getDayOfMonth(dateStr: string): number {
  return parseDateStr(dateStr).getUTCDate();
}

/**
 * Month of year, 1-12
 */
export function getMonth(dateStr: string): number {
  return parseDateStr(dateStr).getUTCMonth() + 1;
}

export function getYear(dateStr: string): number {
  return parseDateStr(dateStr).getUTCFullYear();
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Calendar months from the month of `from` to the month of `to`
 */
export function monthsBetween(from: string, to: string): number {
  return (getYear(to) - getYear(from)) * 12 + (getMonth(to) - getMonth(from));
}

/**
 * First day of the week containing `dateStr`, for weeks beginning on `weekStart`
 */
export function startOfWeek(dateStr: string, weekStart: number): string {
  const back = floorMod(getDayOfWeek(dateStr) - weekStart, 7);
  return addDays(dateStr, -back);
}

/**
 * Modulo that is never negative, so dates before an anchor wrap correctly
 */
export function floorMod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

/**
 * All dates from start to end, both inclusive
 */
export function eachDate(startDate: string, endDate: string): string[] {
  const dates: string[] = [];
  const total = daysBetween(startDate, endDate);
  for (let i = 0; i <= total; i++) {
    dates.push(addDays(startDate, i));
  }
  return dates;
}
