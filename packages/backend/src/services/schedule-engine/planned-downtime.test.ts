import { describe, it, expect } from 'vitest';
import type { PlannedDowntimeCalendar, PlannedDowntimePeriod } from '@shift-rotation/shared';
import { isPlannedDowntime, periodCovers, periodsInRange } from './planned-downtime.js';

const yearEnd: PlannedDowntimePeriod = {
  id: 'stop-year-end',
  startDate: '2024-12-30',
  startShift: 2,
  endDate: '2025-01-02',
  endShift: 1,
};

const calendar: PlannedDowntimeCalendar = {
  version: 'test',
  periods: [
    yearEnd,
    { id: 'stop-one-shift', startDate: '2025-03-10', startShift: 3, endDate: '2025-03-10', endShift: 3 },
  ],
};

describe('periodCovers', () => {
  it('compares full date and shift slots', () => {
    expect(periodCovers(yearEnd, '2024-12-30', 1)).toBe(false);
    expect(periodCovers(yearEnd, '2024-12-30', 2)).toBe(true);
    expect(periodCovers(yearEnd, '2025-01-02', 1)).toBe(true);
    expect(periodCovers(yearEnd, '2025-01-02', 2)).toBe(false);
  });

  it('covers every shift of the days in between, across the year end', () => {
    for (const date of ['2024-12-31', '2025-01-01']) {
      for (const shift of [1, 2, 3]) {
        expect(periodCovers(yearEnd, date, shift)).toBe(true);
      }
    }
  });
});

describe('isPlannedDowntime', () => {
  it('checks every period of the calendar', () => {
    expect(isPlannedDowntime(calendar, '2025-03-10', 3)).toBe(true);
    expect(isPlannedDowntime(calendar, '2025-03-10', 2)).toBe(false);
    expect(isPlannedDowntime(calendar, '2025-06-01', 1)).toBe(false);
  });
});

describe('periodsInRange', () => {
  it('returns periods touching the range', () => {
    expect(periodsInRange(calendar, '2025-01-02', '2025-02-28').map((p) => p.id)).toEqual(['stop-year-end']);
    expect(periodsInRange(calendar, '2025-01-03', '2025-03-09')).toEqual([]);
    expect(periodsInRange(calendar, '2024-01-01', '2025-12-31')).toHaveLength(2);
  });
});
