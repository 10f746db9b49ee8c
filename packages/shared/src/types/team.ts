/**
 * The nine half-teams of the fixed continuous rotation
 */
export type HalfTeamLetter = 'A' | 'B' | 'C' | 'D' | 'E' | 'F' | 'G' | 'H' | 'I';

/**
 * Which half-teams work each shift of a day in the fixed rotation.
 * `shifts[0]` is the first shift of the day (sortOrder 1).
 */
export interface RotationRosterDay {
  date: string; // ISO date (YYYY-MM-DD)
  cycleDay: number; // 1-based position in the rotation cycle
  shifts: HalfTeamLetter[][];
  offDuty: HalfTeamLetter[];
}
