import type { PlannedDowntimeCalendar, PlannedDowntimePeriod } from '@shift-rotation/shared';

export const EMPTY_DOWNTIME_CALENDAR: PlannedDowntimeCalendar = { version: 'none', periods: [] };

function compareSlot(dateA: string, shiftA: number, dateB: string, shiftB: number): number {
  if (dateA !== dateB) return dateA < dateB ? -1 : 1;
  return shiftA - shiftB;
}

/**
 * Whether a (date, shift position) slot falls inside a period.
 * Periods are compared on full slots, so a span may cross month and year ends.
 */
export function periodCovers(period: PlannedDowntimePeriod, date: string, shiftPosition: number): boolean {
  return (
    compareSlot(period.startDate, period.startShift, date, shiftPosition) <= 0 &&
    compareSlot(date, shiftPosition, period.endDate, period.endShift) <= 0
  );
}

export function isPlannedDowntime(
  calendar: PlannedDowntimeCalendar,
  date: string,
  shiftPosition: number
): boolean {
  return calendar.periods.some((period) => periodCovers(period, date, shiftPosition));
}

/**
 * Periods touching any date of the inclusive range
 */
export function periodsInRange(
  calendar: PlannedDowntimeCalendar,
  startDate: string,
  endDate: string
): PlannedDowntimePeriod[] {
  return calendar.periods.filter((p) => p.startDate <= endDate && p.endDate >= startDate);
}
