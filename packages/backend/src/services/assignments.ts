import type {
  AssignmentStatus,
  CreateScheduleAssignmentInput,
  ScheduleAssignment,
} from '@shift-rotation/shared';
import { generateId } from '../utils/id.js';
import { formatLocalDateStr, isValidDateStr } from './schedule-engine/dates.js';
import type { CreateOptions } from './patterns.js';

/**
 * Status as of `today`, derived from the validity window and the kill-switch.
 * A cancelled assignment stays cancelled.
 */
export function computeAssignmentStatus(assignment: ScheduleAssignment, today: string): AssignmentStatus {
  if (assignment.status === 'cancelled') return 'cancelled';
  if (!assignment.active) return 'suspended';
  if (today < assignment.startDate) return 'pending';
  if (assignment.endDate !== null && today > assignment.endDate) return 'expired';
  return 'active';
}

export interface CreateAssignmentOptions extends CreateOptions {
  today?: string; // YYYY-MM-DD local calendar date for the initial status
}

export function createScheduleAssignment(
  input: CreateScheduleAssignmentInput,
  options: CreateAssignmentOptions = {}
): ScheduleAssignment {
  const endDate = input.endDate ?? null;

  if (!isValidDateStr(input.startDate)) {
    throw new Error(`Invalid start date: ${input.startDate}`);
  }
  if (endDate !== null && !isValidDateStr(endDate)) {
    throw new Error(`Invalid end date: ${endDate}`);
  }
  if (endDate !== null && endDate < input.startDate) {
    throw new Error(`End date ${endDate} is before start date ${input.startDate}`);
  }
  if (options.today !== undefined && !isValidDateStr(options.today)) {
    throw new Error(`Invalid current date: ${options.today}`);
  }

  const now = options.now ?? new Date().toISOString();
  const assignment: ScheduleAssignment = {
    id: input.id ?? generateId(),
    userId: input.userId,
    teamId: input.teamId,
    patternId: input.patternId,
    startDate: input.startDate,
    endDate,
    priority: input.priority ?? 'normal',
    status: 'active',
    active: true,
    createdAt: now,
    updatedAt: now,
  };
  assignment.status = computeAssignmentStatus(assignment, options.today ?? formatLocalDateStr(new Date(now)));
  return assignment;
}

/**
 * Soft delete: the assignment stops governing but stays in history
 */
export function retireAssignment(assignment: ScheduleAssignment, options: CreateOptions = {}): ScheduleAssignment {
  return {
    ...assignment,
    active: false,
    status: 'cancelled',
    updatedAt: options.now ?? new Date().toISOString(),
  };
}
