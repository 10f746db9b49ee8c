/**
 * Shift represents a named block of working time (e.g. Morning 06:00-14:00).
 * Shifts are reference data: the engine only reads them.
 * A shift whose endTime is not after its startTime crosses midnight.
 */
export interface Shift {
  id: string;
  name: string;
  shortName?: string;
  startTime: string; // HH:MM format
  endTime: string; // HH:MM format
  sortOrder: number; // Position within the day, 1-based (morning = 1)
}

/**
 * Working time window of a single member on a shift, possibly reduced by an exception
 */
export interface TimeWindow {
  startTime: string; // HH:MM format
  endTime: string; // HH:MM format
}
