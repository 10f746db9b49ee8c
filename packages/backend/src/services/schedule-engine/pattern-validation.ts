import type {
  CreateRecurrencePatternInput,
  PatternDay,
  PatternValidationIssue,
  PatternValidationResult,
  RecurrencePattern,
} from '@shift-rotation/shared';
import { isValidDateStr } from './dates.js';

/**
 * Thrown when a pattern is created from invalid input.
 * Carries every issue found, not just the first.
 */
export class PatternValidationError extends Error {
  readonly issues: PatternValidationIssue[];

  constructor(issues: PatternValidationIssue[]) {
    super(`Invalid recurrence pattern: ${issues.map((i) => i.message).join('; ')}`);
    this.name = 'PatternValidationError';
    this.issues = issues;
  }
}

type PatternShape = CreateRecurrencePatternInput | RecurrencePattern;

export function isCycleFrequency(frequency: RecurrencePattern['frequency']): boolean {
  return frequency === 'rotation_cycle' || frequency === 'custom';
}

/**
 * Validate the ordered day list of a cycle pattern.
 * Day numbers must run 1, 2, 3, ... with no gaps or duplicates.
 */
export function validatePatternDays(
  patternDays: PatternDay[],
  cycleLength?: number
): PatternValidationIssue[] {
  const issues: PatternValidationIssue[] = [];

  if (patternDays.length === 0) {
    issues.push({ code: 'empty_pattern', message: 'Pattern is empty: at least one day is required' });
    return issues;
  }

  for (let i = 0; i < patternDays.length; i++) {
    const expected = i + 1;
    if (patternDays[i].dayNumber !== expected) {
      issues.push({
        code: 'non_sequential_days',
        message: `Pattern day numbers must be sequential from 1: expected ${expected} but found ${patternDays[i].dayNumber}`,
      });
      break;
    }
  }

  if (cycleLength !== undefined) {
    if (!Number.isInteger(cycleLength) || cycleLength <= 0) {
      issues.push({
        code: 'invalid_cycle_length',
        message: `Cycle length must be a positive integer, got ${cycleLength}`,
      });
    } else if (cycleLength !== patternDays.length) {
      issues.push({
        code: 'cycle_length_mismatch',
        message: `Cycle length ${cycleLength} does not match the ${patternDays.length} pattern days`,
      });
    }
  }

  return issues;
}

function validateIntegerList(
  values: number[],
  min: number,
  max: number
): number | null {
  const bad = values.find((v) => !Number.isInteger(v) || v < min || v > max);
  return bad === undefined ? null : bad;
}

/**
 * Validate a pattern definition. Run once when a pattern is created,
 * never on every evaluation.
 */
export function validatePattern(pattern: PatternShape): PatternValidationResult {
  const issues: PatternValidationIssue[] = [];
  const interval = pattern.interval ?? 1;

  if (!Number.isInteger(interval) || interval < 1) {
    issues.push({ code: 'invalid_interval', message: `Interval must be an integer >= 1, got ${interval}` });
  }

  if (!isValidDateStr(pattern.startDate)) {
    issues.push({ code: 'invalid_date', message: `Invalid start date: ${pattern.startDate}` });
  }

  const end = pattern.endCondition;
  if (end?.type === 'count' && (!Number.isInteger(end.count) || end.count < 1)) {
    issues.push({ code: 'invalid_end_condition', message: `Occurrence count must be >= 1, got ${end.count}` });
  }
  if (end?.type === 'until') {
    if (!isValidDateStr(end.untilDate)) {
      issues.push({ code: 'invalid_end_condition', message: `Invalid end date: ${end.untilDate}` });
    } else if (isValidDateStr(pattern.startDate) && end.untilDate < pattern.startDate) {
      issues.push({
        code: 'invalid_end_condition',
        message: `End date ${end.untilDate} is before start date ${pattern.startDate}`,
      });
    }
  }

  if (isCycleFrequency(pattern.frequency)) {
    issues.push(...validatePatternDays(pattern.patternDays ?? [], pattern.cycleLength));
    return { valid: issues.length === 0, issues };
  }

  if (!pattern.shiftId) {
    issues.push({ code: 'missing_shift', message: `A ${pattern.frequency} pattern needs a shiftId` });
  }

  if (pattern.frequency === 'weekly') {
    const days = pattern.daysOfWeek ?? [];
    if (days.length === 0) {
      issues.push({ code: 'missing_days_of_week', message: 'A weekly pattern needs at least one day of week' });
    } else {
      const bad = validateIntegerList(days, 0, 6);
      if (bad !== null) {
        issues.push({ code: 'invalid_day_of_week', message: `Invalid day of week: ${bad}` });
      }
    }
    if (pattern.weekStart !== undefined && validateIntegerList([pattern.weekStart], 0, 6) !== null) {
      issues.push({ code: 'invalid_day_of_week', message: `Invalid week start: ${pattern.weekStart}` });
    }
  }

  if (pattern.frequency === 'monthly' || pattern.frequency === 'yearly') {
    const bad = validateIntegerList(pattern.daysOfMonth ?? [], 1, 31);
    if (bad !== null) {
      issues.push({ code: 'invalid_day_of_month', message: `Invalid day of month: ${bad}` });
    }
  }

  if (pattern.frequency === 'yearly') {
    const bad = validateIntegerList(pattern.months ?? [], 1, 12);
    if (bad !== null) {
      issues.push({ code: 'invalid_month', message: `Invalid month: ${bad}` });
    }
  }

  return { valid: issues.length === 0, issues };
}
