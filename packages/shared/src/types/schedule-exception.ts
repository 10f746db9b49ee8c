/**
 * Exception types, grouped by prefix:
 * - absence_*: the user does not work that day
 * - change_*: the user works a different shift (or swaps with a colleague)
 * - reduction_*: the user works the same shift with a shorter time window
 */
export type ExceptionType =
  | 'absence_vacation'
  | 'absence_sick'
  | 'absence_special'
  | 'change_company'
  | 'change_swap'
  | 'change_special'
  | 'reduction_personal'
  | 'reduction_rol'
  | 'reduction_union';

export type ExceptionCategory = 'absence' | 'change' | 'reduction';

export type ExceptionStatus = 'draft' | 'pending' | 'approved' | 'rejected';

export type ExceptionPriority = 'low' | 'normal' | 'high' | 'urgent';

export const EXCEPTION_PRIORITY_LEVELS: Record<ExceptionPriority, number> = {
  low: 1,
  normal: 5,
  high: 8,
  urgent: 10,
};

/**
 * Whether a freshly created exception of each type needs a supervisor's approval
 */
export const EXCEPTION_REQUIRES_APPROVAL: Record<ExceptionType, boolean> = {
  absence_vacation: false,
  absence_sick: false,
  absence_special: true,
  change_company: true,
  change_swap: true,
  change_special: true,
  reduction_personal: true,
  reduction_rol: false,
  reduction_union: false,
};

/**
 * ScheduleException overrides a user's schedule on a single date.
 * Deactivation (active=false) hides an exception without deleting it.
 */
export interface ScheduleException {
  id: string;
  userId: string;
  targetDate: string; // ISO date (YYYY-MM-DD)
  exceptionType: ExceptionType;
  status: ExceptionStatus;
  requiresApproval: boolean;
  priority: ExceptionPriority;

  // change_*: shift worked instead of the planned one
  newShiftId?: string | null;

  // reduction_*: reduced working window
  newStartTime?: string | null; // HH:MM format
  newEndTime?: string | null; // HH:MM format

  swapWithUserId?: string | null;
  replacementUserId?: string | null;

  // Approval record
  approvedByUserId?: string | null;
  approvedAt?: string | null;
  rejectionReason?: string | null;

  notes?: string;
  active: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface CreateScheduleExceptionInput {
  id?: string;
  userId: string;
  targetDate: string;
  exceptionType: ExceptionType;
  priority?: ExceptionPriority; // Defaults to 'normal'
  requiresApproval?: boolean; // Defaults per type, see EXCEPTION_REQUIRES_APPROVAL
  newShiftId?: string | null;
  newStartTime?: string | null;
  newEndTime?: string | null;
  swapWithUserId?: string | null;
  replacementUserId?: string | null;
  notes?: string;
}

/**
 * Workflow actions:
 * draft --submit--> pending --approve--> approved
 *                   pending --reject---> rejected
 * any state --deactivate--> inactive
 */
export type ExceptionAction = 'submit' | 'approve' | 'reject' | 'deactivate';

/**
 * Two effective exceptions with equal priority that ask for incompatible overrides on the same date
 */
export interface ExceptionConflict {
  userId: string;
  date: string;
  exceptionIds: [string, string];
  description: string;
}
