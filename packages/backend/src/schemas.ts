import { z } from 'zod';
import { EXCEPTION_REQUIRES_APPROVAL } from '@shift-rotation/shared';
import { isValidDateStr, isValidTimeStr } from './services/schedule-engine/dates.js';
import { DEFAULT_ROTATION_SHIFTS } from './services/schedule-engine/rotation.js';

// Request body and reference data validators

export const dateString = z
  .string()
  .refine(isValidDateStr, { message: 'Expected a date in YYYY-MM-DD format' });

export const timeString = z
  .string()
  .refine(isValidTimeStr, { message: 'Expected a time in HH:MM format' });

export const shiftSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  shortName: z.string().optional(),
  startTime: timeString,
  endTime: timeString,
  sortOrder: z.number().int(),
});

export const patternDaySchema = z.object({
  dayNumber: z.number().int(),
  shiftId: z.string().min(1).nullable(),
});

export const endConditionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('never') }),
  z.object({ type: z.literal('count'), count: z.number().int() }),
  z.object({ type: z.literal('until'), untilDate: z.string() }),
]);

const frequencySchema = z.enum(['daily', 'weekly', 'monthly', 'yearly', 'rotation_cycle', 'custom']);

/**
 * Pattern definition as submitted for creation. Field values are left to
 * validatePattern so that every issue is reported with its code.
 */
export const createPatternInputSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  frequency: frequencySchema,
  interval: z.number().optional(),
  startDate: z.string(),
  endCondition: endConditionSchema.optional(),
  shiftId: z.string().min(1).optional(),
  daysOfWeek: z.array(z.number()).optional(),
  weekStart: z.number().optional(),
  daysOfMonth: z.array(z.number()).optional(),
  months: z.array(z.number()).optional(),
  cycleLength: z.number().optional(),
  patternDays: z.array(patternDaySchema).optional(),
});

export const recurrencePatternSchema = createPatternInputSchema.extend({
  id: z.string().min(1),
  interval: z.number().int().min(1).default(1),
  startDate: dateString,
  endCondition: endConditionSchema.default({ type: 'never' }),
  active: z.boolean().default(true),
  createdAt: z.string().default(''),
  updatedAt: z.string().default(''),
});

export const assignmentSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  teamId: z.string().min(1),
  patternId: z.string().min(1),
  startDate: dateString,
  endDate: dateString.nullable().default(null),
  priority: z.enum(['low', 'normal', 'high', 'override']).default('normal'),
  status: z.enum(['active', 'pending', 'expired', 'suspended', 'cancelled']).default('active'),
  active: z.boolean().default(true),
  createdAt: z.string().default(''),
  updatedAt: z.string().default(''),
});

export const exceptionTypeSchema = z.enum([
  'absence_vacation',
  'absence_sick',
  'absence_special',
  'change_company',
  'change_swap',
  'change_special',
  'reduction_personal',
  'reduction_rol',
  'reduction_union',
]);

export const exceptionSchema = z
  .object({
    id: z.string().min(1),
    userId: z.string().min(1),
    targetDate: dateString,
    exceptionType: exceptionTypeSchema,
    status: z.enum(['draft', 'pending', 'approved', 'rejected']).default('draft'),
    requiresApproval: z.boolean().optional(),
    priority: z.enum(['low', 'normal', 'high', 'urgent']).default('normal'),
    newShiftId: z.string().nullable().optional(),
    newStartTime: timeString.nullable().optional(),
    newEndTime: timeString.nullable().optional(),
    swapWithUserId: z.string().nullable().optional(),
    replacementUserId: z.string().nullable().optional(),
    approvedByUserId: z.string().nullable().optional(),
    approvedAt: z.string().nullable().optional(),
    rejectionReason: z.string().nullable().optional(),
    notes: z.string().optional(),
    active: z.boolean().default(true),
    createdAt: z.string().default(''),
    updatedAt: z.string().default(''),
  })
  .transform((exception) => ({
    ...exception,
    requiresApproval: exception.requiresApproval ?? EXCEPTION_REQUIRES_APPROVAL[exception.exceptionType],
  }));

export const snapshotSchema = z.object({
  patterns: z.array(recurrencePatternSchema).default([]),
  assignments: z.array(assignmentSchema).default([]),
  exceptions: z.array(exceptionSchema).default([]),
  shifts: z.array(shiftSchema).default(DEFAULT_ROTATION_SHIFTS),
});

export const plannedDowntimePeriodSchema = z
  .object({
    id: z.string().min(1),
    startDate: dateString,
    startShift: z.number().int().min(1),
    endDate: dateString,
    endShift: z.number().int().min(1),
    description: z.string().optional(),
  })
  .refine(
    (p) => p.startDate < p.endDate || (p.startDate === p.endDate && p.startShift <= p.endShift),
    { message: 'Downtime period ends before it starts' }
  );

export const plannedDowntimeCalendarSchema = z.object({
  version: z.string().min(1),
  periods: z.array(plannedDowntimePeriodSchema),
});

// Route bodies

export const composeRequestSchema = z.object({
  userId: z.string().min(1),
  startDate: dateString,
  endDate: dateString,
  snapshot: snapshotSchema,
  includeStatistics: z.boolean().optional(),
});

export const rosterRequestSchema = z.object({
  teamId: z.string().min(1),
  date: dateString,
  snapshot: snapshotSchema,
});

export const resolveRequestSchema = z.object({
  userId: z.string().min(1),
  date: dateString,
  assignments: z.array(assignmentSchema),
});

export const evaluateRequestSchema = z.object({
  pattern: recurrencePatternSchema,
  startDate: dateString,
  endDate: dateString.optional(), // Defaults to startDate
});

export const effectiveRequestSchema = z.object({
  userId: z.string().min(1),
  date: dateString,
  exceptions: z.array(exceptionSchema),
});

export const conflictsRequestSchema = z.object({
  exceptions: z.array(exceptionSchema),
});

export const transitionRequestSchema = z.object({
  exception: exceptionSchema,
  action: z.enum(['submit', 'approve', 'reject', 'deactivate']),
  actorUserId: z.string().min(1).optional(),
  reason: z.string().optional(),
});

export const createExceptionRequestSchema = z.object({
  id: z.string().min(1).optional(),
  userId: z.string().min(1),
  targetDate: z.string(),
  exceptionType: exceptionTypeSchema,
  priority: z.enum(['low', 'normal', 'high', 'urgent']).optional(),
  requiresApproval: z.boolean().optional(),
  newShiftId: z.string().nullable().optional(),
  newStartTime: z.string().nullable().optional(),
  newEndTime: z.string().nullable().optional(),
  swapWithUserId: z.string().nullable().optional(),
  replacementUserId: z.string().nullable().optional(),
  notes: z.string().optional(),
});

/**
 * Flatten zod issues into `path: message` strings for error responses
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
