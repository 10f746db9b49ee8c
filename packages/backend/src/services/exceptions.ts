import type { CreateScheduleExceptionInput, ScheduleException } from '@shift-rotation/shared';
import { EXCEPTION_REQUIRES_APPROVAL } from '@shift-rotation/shared';
import { generateId } from '../utils/id.js';
import { isValidDateStr, isValidTimeStr } from './schedule-engine/dates.js';
import { exceptionCategory } from './schedule-engine/exception-overlay.js';
import type { CreateOptions } from './patterns.js';

export class InvalidExceptionError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid schedule exception: ${problems.join('; ')}`);
    this.name = 'InvalidExceptionError';
    this.problems = problems;
  }
}

/**
 * Type-specific field checks
 */
export function validateExceptionInput(input: CreateScheduleExceptionInput): string[] {
  const problems: string[] = [];

  if (!isValidDateStr(input.targetDate)) {
    problems.push(`Invalid target date: ${input.targetDate}`);
  }

  switch (exceptionCategory(input.exceptionType)) {
    case 'change':
      if (input.exceptionType === 'change_swap' && !input.swapWithUserId) {
        problems.push('A swap needs swapWithUserId');
      } else if (!input.newShiftId && !input.swapWithUserId) {
        problems.push(`${input.exceptionType} needs newShiftId or swapWithUserId`);
      }
      if (input.swapWithUserId && input.swapWithUserId === input.userId) {
        problems.push('A user cannot swap with themselves');
      }
      break;

    case 'reduction':
      if (!input.newStartTime || !isValidTimeStr(input.newStartTime)) {
        problems.push(`${input.exceptionType} needs a valid newStartTime (HH:MM)`);
      }
      if (!input.newEndTime || !isValidTimeStr(input.newEndTime)) {
        problems.push(`${input.exceptionType} needs a valid newEndTime (HH:MM)`);
      }
      if (input.newStartTime && input.newStartTime === input.newEndTime) {
        problems.push('Reduced window is empty');
      }
      break;

    case 'absence':
      break;
  }

  return problems;
}

/**
 * New exception in draft state. Types that need no approval are
 * effective immediately; the rest must go through submit/approve.
 */
export function createScheduleException(
  input: CreateScheduleExceptionInput,
  options: CreateOptions = {}
): ScheduleException {
  const problems = validateExceptionInput(input);
  if (problems.length > 0) {
    throw new InvalidExceptionError(problems);
  }

  const now = options.now ?? new Date().toISOString();
  return {
    id: input.id ?? generateId(),
    userId: input.userId,
    targetDate: input.targetDate,
    exceptionType: input.exceptionType,
    status: 'draft',
    requiresApproval: input.requiresApproval ?? EXCEPTION_REQUIRES_APPROVAL[input.exceptionType],
    priority: input.priority ?? 'normal',
    newShiftId: input.newShiftId ?? null,
    newStartTime: input.newStartTime ?? null,
    newEndTime: input.newEndTime ?? null,
    swapWithUserId: input.swapWithUserId ?? null,
    replacementUserId: input.replacementUserId ?? null,
    approvedByUserId: null,
    approvedAt: null,
    rejectionReason: null,
    notes: input.notes,
    active: true,
    createdAt: now,
    updatedAt: now,
  };
}
