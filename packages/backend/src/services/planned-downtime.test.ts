import { describe, it, expect } from 'vitest';
import { loadPlannedDowntime, parsePlannedDowntime } from './planned-downtime.js';
import { DEFAULT_PLANNED_DOWNTIME_FILE } from '../config.js';
import { EMPTY_DOWNTIME_CALENDAR } from './schedule-engine/planned-downtime.js';

describe('parsePlannedDowntime', () => {
  it('accepts a well-formed calendar', () => {
    const calendar = parsePlannedDowntime({
      version: 'v1',
      periods: [{ id: 'p1', startDate: '2025-01-01', startShift: 1, endDate: '2025-01-01', endShift: 3 }],
    });
    expect(calendar.periods).toHaveLength(1);
  });

  it('rejects a period that ends before it starts', () => {
    expect(() =>
      parsePlannedDowntime({
        version: 'v1',
        periods: [{ id: 'p1', startDate: '2025-01-01', startShift: 3, endDate: '2025-01-01', endShift: 1 }],
      })
    ).toThrow('Invalid planned downtime calendar: periods.0: Downtime period ends before it starts');
  });

  it('rejects malformed dates', () => {
    expect(() =>
      parsePlannedDowntime({
        version: 'v1',
        periods: [{ id: 'p1', startDate: '2025-02-30', startShift: 1, endDate: '2025-03-01', endShift: 1 }],
      })
    ).toThrow('periods.0.startDate: Expected a date in YYYY-MM-DD format');
  });
});

describe('loadPlannedDowntime', () => {
  it('loads the bundled calendar', async () => {
    const calendar = await loadPlannedDowntime(DEFAULT_PLANNED_DOWNTIME_FILE);
    expect(calendar.version).toBe('2025.1');
    expect(calendar.periods.map((p) => p.id)).toEqual([
      'stop-2025-spring',
      'stop-2025-summer',
      'stop-2025-year-end',
    ]);
  });

  it('treats a missing file as no downtime', async () => {
    const calendar = await loadPlannedDowntime('/nonexistent/planned-downtime.json');
    expect(calendar).toBe(EMPTY_DOWNTIME_CALENDAR);
  });
});
