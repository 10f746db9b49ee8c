import type { RecurrencePattern, ShiftOutcome } from './recurrence-pattern.js';
import type { ScheduleAssignment, ResolutionAmbiguity } from './schedule-assignment.js';
import type { ScheduleException, ExceptionConflict } from './schedule-exception.js';
import type { Shift } from './shift.js';

/**
 * Consistent snapshot of upstream records for one request scope
 */
export interface ScheduleSnapshot {
  patterns: RecurrencePattern[];
  assignments: ScheduleAssignment[];
  exceptions: ScheduleException[];
  shifts: Shift[];
}

/**
 * One worker on a shift of a composed day
 */
export interface ShiftMember {
  userId: string;
  teamId: string;
  assignmentId: string;
  startTime: string; // HH:MM format, reduced if a reduction exception applies
  endTime: string; // HH:MM format
  exceptionIds: string[]; // Exceptions that shaped this entry
}

export interface WorkScheduleShift {
  shiftId: string;
  shiftName: string;
  sortOrder: number;
  members: ShiftMember[];
  teamIds: string[];
  plannedDowntime: boolean;
}

/**
 * WorkScheduleDay is the composed, user-facing view of one date.
 * It is derived data and can always be recomputed from the snapshot.
 */
export interface WorkScheduleDay {
  date: string; // ISO date (YYYY-MM-DD)
  shifts: WorkScheduleShift[]; // Ordered by shift sortOrder
  restUserIds: string[];
  conflicts: ExceptionConflict[];
  errors: ScheduleError[];
}

/**
 * Per-user outcome of one date before grouping by shift
 */
export interface UserDayResolution {
  userId: string;
  date: string;
  assignment: ScheduleAssignment | null;
  baseOutcome: ShiftOutcome;
  outcome: ShiftOutcome;
  startTime: string | null;
  endTime: string | null;
  appliedExceptionIds: string[];
  conflicts: ExceptionConflict[];
  ambiguity: ResolutionAmbiguity | null;
  errors: ScheduleError[];
}

/**
 * Error recorded for a single date/user during composition.
 * The batch continues; the entry keeps whatever could be resolved.
 */
export interface ScheduleError {
  type: ScheduleErrorType;
  message: string;
  details?: {
    userId?: string;
    date?: string;
    assignmentId?: string;
    patternId?: string;
    exceptionId?: string;
    [key: string]: string | undefined;
  };
}

export type ScheduleErrorType =
  | 'invalid_request'
  | 'pattern_not_found'
  | 'shift_not_found'
  | 'swap_partner_unresolved'
  | 'evaluation_failed';

export interface ScheduleWarning {
  type: ScheduleWarningType;
  message: string;
  details?: {
    userId?: string;
    date?: string;
    [key: string]: string | string[] | undefined;
  };
}

export type ScheduleWarningType = 'resolution_ambiguity' | 'exception_conflict';

export interface ComposeRangeResult {
  success: boolean; // False when any day carries an error
  userId: string;
  startDate: string;
  endDate: string;
  days: WorkScheduleDay[];
  errors: ScheduleError[];
  warnings: ScheduleWarning[];
  cancelled?: boolean; // Set when an async composition was aborted between batches
}

export interface TeamRosterResult {
  success: boolean;
  teamId: string;
  date: string;
  day: WorkScheduleDay;
  errors: ScheduleError[];
  warnings: ScheduleWarning[];
}

/**
 * Aggregate figures over a composed range
 */
export interface ScheduleStatistics {
  totalDays: number;
  workDays: number;
  restDays: number;
  shiftCounts: Record<string, number>; // shiftId -> days worked
  plannedDowntimeDays: number;
  conflictCount: number;
  errorCount: number;
}
