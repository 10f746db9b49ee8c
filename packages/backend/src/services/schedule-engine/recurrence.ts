import type { RecurrencePattern, ShiftOutcome } from '@shift-rotation/shared';
import {
  addDays,
  daysBetween,
  daysInMonth,
  eachDate,
  floorMod,
  getDayOfMonth,
  getDayOfWeek,
  getMonth,
  getYear,
  monthsBetween,
  startOfWeek,
} from './dates.js';
import { isCycleFrequency } from './pattern-validation.js';

const MONDAY = 1;

export const REST: ShiftOutcome = { kind: 'rest', reason: 'pattern' };
export const OUT_OF_RANGE: ShiftOutcome = { kind: 'rest', reason: 'out_of_range' };

function work(shiftId: string): ShiftOutcome {
  return { kind: 'work', shiftId };
}

function requireShiftId(pattern: RecurrencePattern): string {
  if (!pattern.shiftId) {
    throw new Error(`Pattern ${pattern.id} (${pattern.frequency}) has no shiftId`);
  }
  return pattern.shiftId;
}

function cycleLengthOf(pattern: RecurrencePattern): number {
  return pattern.cycleLength ?? pattern.patternDays?.length ?? 0;
}

/**
 * Evaluate a pattern on one date.
 *
 * Pure function of (pattern, date): no clock reads and no caching, so the same
 * inputs always give the same outcome. Dates before the start or past the end
 * condition resolve to rest with reason `out_of_range`.
 */
export function evaluate(pattern: RecurrencePattern, date: string): ShiftOutcome {
  if (date < pattern.startDate) {
    return OUT_OF_RANGE;
  }

  const end = pattern.endCondition;
  if (end.type === 'until' && date > end.untilDate) {
    return OUT_OF_RANGE;
  }

  if (isCycleFrequency(pattern.frequency)) {
    return evaluateCycle(pattern, date);
  }

  if (end.type === 'count' && occurrencesBefore(pattern, date) >= end.count) {
    return OUT_OF_RANGE;
  }

  return matchesCalendarRule(pattern, date) ? work(requireShiftId(pattern)) : REST;
}

/**
 * Evaluate a pattern on every date of an inclusive range
 */
export function evaluateRange(
  pattern: RecurrencePattern,
  startDate: string,
  endDate: string
): Map<string, ShiftOutcome> {
  const outcomes = new Map<string, ShiftOutcome>();
  for (const date of eachDate(startDate, endDate)) {
    outcomes.set(date, evaluate(pattern, date));
  }
  return outcomes;
}

/**
 * Cycle patterns (rotation_cycle and custom).
 * position = floorMod(dayOffset, cycleLength), then pattern day position+1.
 */
function evaluateCycle(pattern: RecurrencePattern, date: string): ShiftOutcome {
  const cycleLength = cycleLengthOf(pattern);
  if (cycleLength <= 0) {
    throw new Error(`Pattern ${pattern.id} has no cycle days`);
  }

  const dayOffset = daysBetween(pattern.startDate, date);
  if (dayOffset < 0) {
    return OUT_OF_RANGE;
  }

  const end = pattern.endCondition;
  if (end.type === 'count' && Math.floor(dayOffset / cycleLength) >= end.count) {
    return OUT_OF_RANGE;
  }

  const position = floorMod(dayOffset, cycleLength);
  const patternDay = pattern.patternDays?.find((d) => d.dayNumber === position + 1);
  if (!patternDay) {
    throw new Error(`Pattern ${pattern.id} has no day ${position + 1}`);
  }

  return patternDay.shiftId === null ? REST : work(patternDay.shiftId);
}

function weekStartOf(pattern: RecurrencePattern): number {
  return pattern.weekStart ?? MONDAY;
}

function daysOfMonthOf(pattern: RecurrencePattern): number[] {
  return pattern.daysOfMonth && pattern.daysOfMonth.length > 0
    ? pattern.daysOfMonth
    : [getDayOfMonth(pattern.startDate)];
}

function monthsOf(pattern: RecurrencePattern): number[] {
  return pattern.months && pattern.months.length > 0 ? pattern.months : [getMonth(pattern.startDate)];
}

function weekIndex(pattern: RecurrencePattern, date: string): number {
  const ws = weekStartOf(pattern);
  return daysBetween(startOfWeek(pattern.startDate, ws), startOfWeek(date, ws)) / 7;
}

/**
 * Whether a date on or after the start matches a daily/weekly/monthly/yearly rule
 */
function matchesCalendarRule(pattern: RecurrencePattern, date: string): boolean {
  const interval = pattern.interval;

  switch (pattern.frequency) {
    case 'daily':
      return daysBetween(pattern.startDate, date) % interval === 0;

    case 'weekly':
      return (
        weekIndex(pattern, date) % interval === 0 &&
        (pattern.daysOfWeek ?? []).includes(getDayOfWeek(date))
      );

    case 'monthly':
      return (
        monthsBetween(pattern.startDate, date) % interval === 0 &&
        daysOfMonthOf(pattern).includes(getDayOfMonth(date))
      );

    case 'yearly':
      return (
        (getYear(date) - getYear(pattern.startDate)) % interval === 0 &&
        monthsOf(pattern).includes(getMonth(date)) &&
        daysOfMonthOf(pattern).includes(getDayOfMonth(date))
      );

    default:
      return false;
  }
}

/**
 * Number of matching dates in [startDate, date). Used for count end conditions.
 */
export function occurrencesBefore(pattern: RecurrencePattern, date: string): number {
  if (date <= pattern.startDate) return 0;
  const interval = pattern.interval;

  switch (pattern.frequency) {
    case 'daily': {
      const offset = daysBetween(pattern.startDate, date);
      return Math.floor((offset - 1) / interval) + 1;
    }

    case 'weekly':
      return weeklyOccurrencesBefore(pattern, date);

    case 'monthly': {
      let total = 0;
      const months = monthsBetween(pattern.startDate, date);
      for (let k = 0; k <= months; k += interval) {
        total += candidateDatesInMonth(pattern, k).filter(
          (d) => d >= pattern.startDate && d < date
        ).length;
      }
      return total;
    }

    case 'yearly': {
      let total = 0;
      const startYear = getYear(pattern.startDate);
      const years = getYear(date) - startYear;
      for (let k = 0; k <= years; k += interval) {
        total += candidateDatesInYear(pattern, startYear + k).filter(
          (d) => d >= pattern.startDate && d < date
        ).length;
      }
      return total;
    }

    default:
      return 0;
  }
}

function weeklyOccurrencesBefore(pattern: RecurrencePattern, date: string): number {
  const ws = weekStartOf(pattern);
  const interval = pattern.interval;
  const days = Array.from(new Set(pattern.daysOfWeek ?? []));
  const firstWeekStart = startOfWeek(pattern.startDate, ws);
  const offsetInWeek = (dow: number) => floorMod(dow - ws, 7);

  const firstWeekHits = days.filter(
    (dow) => addDays(firstWeekStart, offsetInWeek(dow)) >= pattern.startDate
  ).length;

  const currentWeek = weekIndex(pattern, date);
  const activeWeeksBefore = currentWeek > 0 ? Math.floor((currentWeek - 1) / interval) + 1 : 0;
  let total =
    activeWeeksBefore > 0 ? firstWeekHits + (activeWeeksBefore - 1) * days.length : 0;

  if (currentWeek % interval === 0) {
    const weekStartDate = startOfWeek(date, ws);
    total += days.filter((dow) => {
      const hit = addDays(weekStartDate, offsetInWeek(dow));
      return hit < date && hit >= pattern.startDate;
    }).length;
  }

  return total;
}

function candidateDatesInMonth(pattern: RecurrencePattern, monthOffset: number): string[] {
  const startYear = getYear(pattern.startDate);
  const absoluteMonth = getMonth(pattern.startDate) - 1 + monthOffset;
  const year = startYear + Math.floor(absoluteMonth / 12);
  const month = floorMod(absoluteMonth, 12) + 1;
  return datesFor(year, month, daysOfMonthOf(pattern));
}

function candidateDatesInYear(pattern: RecurrencePattern, year: number): string[] {
  return monthsOf(pattern).flatMap((month) => datesFor(year, month, daysOfMonthOf(pattern)));
}

/**
 * Dates of a month for the given days, skipping days the month does not have
 */
function datesFor(year: number, month: number, days: number[]): string[] {
  const limit = daysInMonth(year, month);
  const mm = String(month).padStart(2, '0');
  return Array.from(new Set(days))
    .filter((day) => day <= limit)
    .map((day) => `${String(year).padStart(4, '0')}-${mm}-${String(day).padStart(2, '0')}`);
}
