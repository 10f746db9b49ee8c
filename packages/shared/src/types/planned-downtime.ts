/**
 * A planned plant stop, from a shift on one date to a shift on another.
 * Shift positions are 1-based (first shift of the day = 1) and both ends are inclusive.
 */
export interface PlannedDowntimePeriod {
  id: string;
  startDate: string; // ISO date (YYYY-MM-DD)
  startShift: number;
  endDate: string; // ISO date (YYYY-MM-DD)
  endShift: number;
  description?: string;
}

/**
 * Versioned set of downtime periods, loaded as reference data
 */
export interface PlannedDowntimeCalendar {
  version: string;
  periods: PlannedDowntimePeriod[];
}
