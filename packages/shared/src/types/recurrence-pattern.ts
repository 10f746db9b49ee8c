/**
 * How a recurrence pattern repeats.
 * - rotation_cycle: the fixed continuous rotation, expanded for one half-team
 * - custom: a user-defined cycle of work/rest days
 */
export type RecurrenceFrequency =
  | 'daily'
  | 'weekly'
  | 'monthly'
  | 'yearly'
  | 'rotation_cycle'
  | 'custom';

/**
 * When a recurrence stops producing occurrences.
 * For calendar frequencies `count` is the number of matching dates,
 * for cycle frequencies it is the number of whole cycles.
 */
export type EndCondition =
  | { type: 'never' }
  | { type: 'count'; count: number }
  | { type: 'until'; untilDate: string };

/**
 * One day of a cycle. A null shiftId is a rest day.
 */
export interface PatternDay {
  dayNumber: number; // 1..cycleLength
  shiftId: string | null;
}

/**
 * RecurrencePattern describes how a schedule repeats from its start date.
 * Once referenced by an assignment it is never edited, only deactivated,
 * so that past schedules can always be recomputed.
 */
export interface RecurrencePattern {
  id: string;
  name: string;
  frequency: RecurrenceFrequency;
  interval: number; // Repeat every N frequency units (>= 1)
  startDate: string; // ISO date (YYYY-MM-DD)
  endCondition: EndCondition;

  // daily/weekly/monthly/yearly: the shift worked on a matching date
  shiftId?: string;

  // weekly
  daysOfWeek?: number[]; // 0=Sunday, 6=Saturday
  weekStart?: number; // Day the week begins on, defaults to Monday (1)

  // monthly/yearly
  daysOfMonth?: number[]; // 1-31, defaults to the day of startDate
  months?: number[]; // 1-12 (yearly only), defaults to the month of startDate

  // rotation_cycle/custom
  cycleLength?: number;
  patternDays?: PatternDay[];

  active: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface CreateRecurrencePatternInput {
  id?: string;
  name: string;
  frequency: RecurrenceFrequency;
  interval?: number; // Defaults to 1
  startDate: string;
  endCondition?: EndCondition; // Defaults to never
  shiftId?: string;
  daysOfWeek?: number[];
  weekStart?: number;
  daysOfMonth?: number[];
  months?: number[];
  cycleLength?: number; // Defaults to patternDays.length
  patternDays?: PatternDay[];
}

/**
 * Result of evaluating a pattern on a single date
 */
export type ShiftOutcome =
  | { kind: 'work'; shiftId: string }
  | { kind: 'rest'; reason: RestReason };

/**
 * Why a date resolved to rest:
 * - pattern: the pattern schedules no shift on this day
 * - out_of_range: the date is before the start or after the end condition
 * - no_assignment: the user has no governing assignment on this date
 * - absence: an effective absence exception removed the shift
 */
export type RestReason = 'pattern' | 'out_of_range' | 'no_assignment' | 'absence';

export type PatternValidationCode =
  | 'empty_pattern'
  | 'non_sequential_days'
  | 'cycle_length_mismatch'
  | 'invalid_cycle_length'
  | 'invalid_interval'
  | 'invalid_date'
  | 'missing_days_of_week'
  | 'invalid_day_of_week'
  | 'invalid_day_of_month'
  | 'invalid_month'
  | 'missing_shift'
  | 'invalid_end_condition';

export interface PatternValidationIssue {
  code: PatternValidationCode;
  message: string;
}

export interface PatternValidationResult {
  valid: boolean;
  issues: PatternValidationIssue[];
}
