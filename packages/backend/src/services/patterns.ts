import type {
  CreateRecurrencePatternInput,
  PatternDay,
  RecurrencePattern,
} from '@shift-rotation/shared';
import { generateId } from '../utils/id.js';
import {
  PatternValidationError,
  isCycleFrequency,
  validatePattern,
} from './schedule-engine/pattern-validation.js';

export interface CreateOptions {
  now?: string; // ISO timestamp for createdAt/updatedAt
}

function sortPatternDays(days: PatternDay[]): PatternDay[] {
  return [...days].sort((a, b) => a.dayNumber - b.dayNumber);
}

/**
 * Build a pattern from user input and validate it.
 * Throws PatternValidationError listing every issue found.
 */
export function createRecurrencePattern(
  input: CreateRecurrencePatternInput,
  options: CreateOptions = {}
): RecurrencePattern {
  const now = options.now ?? new Date().toISOString();
  const patternDays = input.patternDays ? sortPatternDays(input.patternDays) : undefined;

  const pattern: RecurrencePattern = {
    id: input.id ?? generateId(),
    name: input.name,
    frequency: input.frequency,
    interval: input.interval ?? 1,
    startDate: input.startDate,
    endCondition: input.endCondition ?? { type: 'never' },
    active: true,
    createdAt: now,
    updatedAt: now,
  };

  if (isCycleFrequency(input.frequency)) {
    pattern.patternDays = patternDays ?? [];
    pattern.cycleLength = input.cycleLength ?? pattern.patternDays.length;
  } else {
    pattern.shiftId = input.shiftId;
    if (input.frequency === 'weekly') {
      pattern.daysOfWeek = input.daysOfWeek ? [...input.daysOfWeek].sort((a, b) => a - b) : [];
      if (input.weekStart !== undefined) pattern.weekStart = input.weekStart;
    }
    if (input.frequency === 'monthly' || input.frequency === 'yearly') {
      if (input.daysOfMonth) pattern.daysOfMonth = [...input.daysOfMonth].sort((a, b) => a - b);
    }
    if (input.frequency === 'yearly' && input.months) {
      pattern.months = [...input.months].sort((a, b) => a - b);
    }
  }

  const result = validatePattern(pattern);
  if (!result.valid) {
    throw new PatternValidationError(result.issues);
  }

  return pattern;
}

/**
 * Patterns are never edited once referenced; retiring one keeps it evaluable.
 */
export function deactivatePattern(pattern: RecurrencePattern, options: CreateOptions = {}): RecurrencePattern {
  return { ...pattern, active: false, updatedAt: options.now ?? new Date().toISOString() };
}

export interface CustomPatternInput {
  id?: string;
  name: string;
  startDate: string;
  days: (string | null)[]; // One entry per cycle day, null = rest
}

/**
 * Custom cycle from an ordered list of shifts, e.g. [morning, night, null]
 */
export function buildCustomPattern(input: CustomPatternInput, options: CreateOptions = {}): RecurrencePattern {
  return createRecurrencePattern(
    {
      id: input.id,
      name: input.name,
      frequency: 'custom',
      startDate: input.startDate,
      patternDays: input.days.map((shiftId, i) => ({ dayNumber: i + 1, shiftId })),
    },
    options
  );
}

/**
 * Ordered shift list of a cycle pattern, the inverse of buildCustomPattern
 */
export function extractPatternDays(pattern: RecurrencePattern): (string | null)[] {
  return sortPatternDays(pattern.patternDays ?? []).map((d) => d.shiftId);
}
