import type { ExceptionAction, ExceptionStatus, ScheduleException } from '@shift-rotation/shared';

export type WorkflowState = ExceptionStatus | 'inactive';

export class ExceptionTransitionError extends Error {
  readonly exceptionId: string;
  readonly from: WorkflowState;
  readonly action: ExceptionAction;

  constructor(exceptionId: string, from: WorkflowState, action: ExceptionAction, detail?: string) {
    super(
      `Cannot ${action} exception ${exceptionId} in state ${from}${detail ? `: ${detail}` : ''}`
    );
    this.name = 'ExceptionTransitionError';
    this.exceptionId = exceptionId;
    this.from = from;
    this.action = action;
  }
}

export interface TransitionOptions {
  now?: string; // ISO timestamp recorded on the exception; defaults to the current time
  actorUserId?: string; // Approver for `approve`
  reason?: string; // Rejection reason for `reject`
}

const TRANSITIONS: Record<Exclude<ExceptionAction, 'deactivate'>, { from: ExceptionStatus; to: ExceptionStatus }> = {
  submit: { from: 'draft', to: 'pending' },
  approve: { from: 'pending', to: 'approved' },
  reject: { from: 'pending', to: 'rejected' },
};

export function workflowState(exception: ScheduleException): WorkflowState {
  return exception.active ? exception.status : 'inactive';
}

/**
 * Terminal states: approved, rejected, and deactivated.
 * Approved and rejected exceptions can still be deactivated.
 */
export function isTerminal(exception: ScheduleException): boolean {
  const state = workflowState(exception);
  return state === 'approved' || state === 'rejected' || state === 'inactive';
}

function rejectionDetail(exception: ScheduleException, action: ExceptionAction): string | null {
  if (!exception.active) {
    return 'exception is deactivated';
  }
  if (action === 'deactivate') {
    return null;
  }
  const transition = TRANSITIONS[action];
  if (exception.status !== transition.from) {
    return `expected state ${transition.from}`;
  }
  if (action === 'submit' && !exception.requiresApproval) {
    return 'exception does not require approval';
  }
  return null;
}

export function canTransition(exception: ScheduleException, action: ExceptionAction): boolean {
  return rejectionDetail(exception, action) === null;
}

/**
 * Apply a workflow action and return the updated exception.
 * The input is never mutated.
 *
 *   draft --submit--> pending --approve--> approved
 *                     pending --reject---> rejected
 *   any active state --deactivate--> inactive
 */
export function transitionException(
  exception: ScheduleException,
  action: ExceptionAction,
  options: TransitionOptions = {}
): ScheduleException {
  const detail = rejectionDetail(exception, action);
  if (detail !== null) {
    throw new ExceptionTransitionError(exception.id, workflowState(exception), action, detail);
  }

  const now = options.now ?? new Date().toISOString();

  if (action === 'deactivate') {
    return { ...exception, active: false, updatedAt: now };
  }

  const updated: ScheduleException = {
    ...exception,
    status: TRANSITIONS[action].to,
    updatedAt: now,
  };

  if (action === 'approve') {
    updated.approvedByUserId = options.actorUserId ?? null;
    updated.approvedAt = now;
  }
  if (action === 'reject') {
    updated.rejectionReason = options.reason ?? null;
  }

  return updated;
}
