import type {
  HalfTeamLetter,
  PatternDay,
  RecurrencePattern,
  RotationRosterDay,
  Shift,
} from '@shift-rotation/shared';
import { addDays, daysBetween, floorMod } from './dates.js';

export const HALF_TEAMS: readonly HalfTeamLetter[] = ['A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I'];

export const DEFAULT_ROTATION_REFERENCE_DATE = '2018-11-07';

export const ROTATION_SHIFTS_PER_DAY = 3;

/**
 * Fixed continuous rotation: one row per cycle day, one column per shift
 * (morning, afternoon, night). Every half-team works four days and rests two,
 * and each shift is always covered by two half-teams.
 */
const ROTATION_SCHEME: readonly (readonly HalfTeamLetter[])[][] = [
  [['A', 'B'], ['C', 'D'], ['E', 'F']],
  [['A', 'B'], ['C', 'D'], ['E', 'F']],
  [['A', 'H'], ['D', 'I'], ['G', 'F']],
  [['A', 'H'], ['D', 'I'], ['G', 'F']],
  [['C', 'H'], ['E', 'I'], ['G', 'B']],
  [['C', 'H'], ['E', 'I'], ['G', 'B']],
  [['C', 'D'], ['E', 'F'], ['A', 'B']],
  [['C', 'D'], ['E', 'F'], ['A', 'B']],
  [['D', 'I'], ['G', 'F'], ['A', 'H']],
  [['D', 'I'], ['G', 'F'], ['A', 'H']],
  [['E', 'I'], ['G', 'B'], ['C', 'H']],
  [['E', 'I'], ['G', 'B'], ['C', 'H']],
  [['E', 'F'], ['A', 'B'], ['C', 'D']],
  [['E', 'F'], ['A', 'B'], ['C', 'D']],
  [['G', 'F'], ['A', 'H'], ['D', 'I']],
  [['G', 'F'], ['A', 'H'], ['D', 'I']],
  [['G', 'B'], ['C', 'H'], ['E', 'I']],
  [['G', 'B'], ['C', 'H'], ['E', 'I']],
];

export const ROTATION_CYCLE_LENGTH = ROTATION_SCHEME.length;

/**
 * Default shift definitions for the continuous rotation
 */
export const DEFAULT_ROTATION_SHIFTS: Shift[] = [
  { id: 'morning', name: 'Morning', shortName: 'M', startTime: '06:00', endTime: '14:00', sortOrder: 1 },
  { id: 'afternoon', name: 'Afternoon', shortName: 'A', startTime: '14:00', endTime: '22:00', sortOrder: 2 },
  { id: 'night', name: 'Night', shortName: 'N', startTime: '22:00', endTime: '06:00', sortOrder: 3 },
];

export function isHalfTeamLetter(value: string): value is HalfTeamLetter {
  return HALF_TEAMS.some((team) => team === value);
}

/**
 * Rotate an array by n positions
 * [A, B, C] rotated by 1 becomes [B, C, A]
 */
export function rotateArray<T>(arr: T[], n: number): T[] {
  if (arr.length === 0) return arr;
  const offset = floorMod(n, arr.length);
  return [...arr.slice(offset), ...arr.slice(0, offset)];
}

/**
 * 0-based cycle position of a date. Uses a floor modulo so dates before
 * the reference date still land on the right day of the cycle.
 */
export function rotationCycleIndex(
  date: string,
  referenceDate: string = DEFAULT_ROTATION_REFERENCE_DATE
): number {
  return floorMod(daysBetween(referenceDate, date), ROTATION_CYCLE_LENGTH);
}

/**
 * Shift position (0-based) a half-team works on a cycle day, or null when resting
 */
export function shiftIndexForTeam(cycleIndex: number, team: HalfTeamLetter): number | null {
  const row = ROTATION_SCHEME[cycleIndex];
  const index = row.findIndex((teams) => teams.includes(team));
  return index === -1 ? null : index;
}

/**
 * Which half-teams work each shift on a date, and which rest
 */
export function rotationRosterForDate(
  date: string,
  referenceDate: string = DEFAULT_ROTATION_REFERENCE_DATE
): RotationRosterDay {
  const cycleIndex = rotationCycleIndex(date, referenceDate);
  const shifts = ROTATION_SCHEME[cycleIndex].map((teams) => [...teams]);
  const working = new Set(shifts.flat());
  return {
    date,
    cycleDay: cycleIndex + 1,
    shifts,
    offDuty: HALF_TEAMS.filter((team) => !working.has(team)),
  };
}

/**
 * First date on or after `fromDate` on which the half-team works, searching at most maxDays
 */
export function nextShiftDate(
  team: HalfTeamLetter,
  fromDate: string,
  maxDays: number = ROTATION_CYCLE_LENGTH,
  referenceDate: string = DEFAULT_ROTATION_REFERENCE_DATE
): string | null {
  for (let i = 0; i < maxDays; i++) {
    const date = addDays(fromDate, i);
    if (shiftIndexForTeam(rotationCycleIndex(date, referenceDate), team) !== null) {
      return date;
    }
  }
  return null;
}

export interface RotationPatternOptions {
  shifts?: Shift[]; // Sorted by sortOrder; the first three are used
  referenceDate?: string;
  startDate?: string; // Defaults to the reference date
  id?: string;
  createdAt?: string;
}

/**
 * Expand the fixed rotation into a rotation_cycle pattern for one half-team.
 * When startDate differs from the reference date the cycle is rotated so that
 * day 1 of the pattern falls on startDate.
 */
export function buildRotationPattern(
  team: HalfTeamLetter,
  options: RotationPatternOptions = {}
): RecurrencePattern {
  const referenceDate = options.referenceDate ?? DEFAULT_ROTATION_REFERENCE_DATE;
  const startDate = options.startDate ?? referenceDate;
  const shifts = [...(options.shifts ?? DEFAULT_ROTATION_SHIFTS)].sort(
    (a, b) => a.sortOrder - b.sortOrder
  );
  if (shifts.length < ROTATION_SHIFTS_PER_DAY) {
    throw new Error(`The rotation needs ${ROTATION_SHIFTS_PER_DAY} shifts, got ${shifts.length}`);
  }

  const baseDays = ROTATION_SCHEME.map((_, cycleIndex) => {
    const shiftIndex = shiftIndexForTeam(cycleIndex, team);
    return shiftIndex === null ? null : shifts[shiftIndex].id;
  });
  const aligned = rotateArray(baseDays, rotationCycleIndex(startDate, referenceDate));
  const patternDays: PatternDay[] = aligned.map((shiftId, i) => ({ dayNumber: i + 1, shiftId }));

  const timestamp = options.createdAt ?? new Date().toISOString();
  return {
    id: options.id ?? `rotation-${team}`,
    name: `Continuous rotation - team ${team}`,
    frequency: 'rotation_cycle',
    interval: 1,
    startDate,
    endCondition: { type: 'never' },
    cycleLength: ROTATION_CYCLE_LENGTH,
    patternDays,
    active: true,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/**
 * Bootstrap one rotation pattern per half-team
 */
export function buildRotationPatterns(options: Omit<RotationPatternOptions, 'id'> = {}): RecurrencePattern[] {
  return HALF_TEAMS.map((team) => buildRotationPattern(team, options));
}
