import type { ScheduleStatistics, WorkScheduleDay } from '@shift-rotation/shared';

/**
 * Aggregate figures over composed days.
 * A day counts as a work day when at least one shift has a member.
 */
export function summarizeSchedule(days: WorkScheduleDay[]): ScheduleStatistics {
  const stats: ScheduleStatistics = {
    totalDays: days.length,
    workDays: 0,
    restDays: 0,
    shiftCounts: {},
    plannedDowntimeDays: 0,
    conflictCount: 0,
    errorCount: 0,
  };

  for (const day of days) {
    const worked = day.shifts.filter((s) => s.members.length > 0);
    if (worked.length > 0) {
      stats.workDays++;
    } else {
      stats.restDays++;
    }

    for (const shift of worked) {
      stats.shiftCounts[shift.shiftId] = (stats.shiftCounts[shift.shiftId] ?? 0) + 1;
    }

    if (day.shifts.some((s) => s.plannedDowntime)) {
      stats.plannedDowntimeDays++;
    }

    stats.conflictCount += day.conflicts.length;
    stats.errorCount += day.errors.length;
  }

  return stats;
}
