import { describe, it, expect } from 'vitest';
import type { ScheduleException } from '@shift-rotation/shared';
import {
  ExceptionTransitionError,
  canTransition,
  isTerminal,
  transitionException,
  workflowState,
} from './exception-workflow.js';

const NOW = '2024-01-05T09:30:00.000Z';

// Helper to create a draft special absence (needs approval)
function createDraft(overrides: Partial<ScheduleException> = {}): ScheduleException {
  return {
    id: 'e1',
    userId: 'user-1',
    targetDate: '2024-01-10',
    exceptionType: 'absence_special',
    status: 'draft',
    requiresApproval: true,
    priority: 'normal',
    active: true,
    createdAt: '2024-01-01T00:00:00Z',
    updatedAt: '2024-01-01T00:00:00Z',
    ...overrides,
  };
}

describe('transitionException', () => {
  it('submits a draft that needs approval', () => {
    const submitted = transitionException(createDraft(), 'submit', { now: NOW });
    expect(submitted.status).toBe('pending');
    expect(submitted.updatedAt).toBe(NOW);
  });

  it('records the approver and approval time', () => {
    const approved = transitionException(createDraft({ status: 'pending' }), 'approve', {
      now: NOW,
      actorUserId: 'supervisor-1',
    });
    expect(approved.status).toBe('approved');
    expect(approved.approvedByUserId).toBe('supervisor-1');
    expect(approved.approvedAt).toBe(NOW);
  });

  it('records the rejection reason', () => {
    const rejected = transitionException(createDraft({ status: 'pending' }), 'reject', {
      now: NOW,
      reason: 'Short staffed',
    });
    expect(rejected.status).toBe('rejected');
    expect(rejected.rejectionReason).toBe('Short staffed');
  });

  it('deactivates without changing the status', () => {
    const deactivated = transitionException(createDraft({ status: 'approved' }), 'deactivate', { now: NOW });
    expect(deactivated.active).toBe(false);
    expect(deactivated.status).toBe('approved');
    expect(workflowState(deactivated)).toBe('inactive');
  });

  it('never mutates the input', () => {
    const draft = createDraft();
    transitionException(draft, 'submit', { now: NOW });
    expect(draft.status).toBe('draft');
    expect(draft.updatedAt).toBe('2024-01-01T00:00:00Z');
  });

  it('refuses to submit an exception that needs no approval', () => {
    expect(() => transitionException(createDraft({ requiresApproval: false }), 'submit')).toThrow(
      'Cannot submit exception e1 in state draft: exception does not require approval'
    );
  });

  it('refuses to approve a draft', () => {
    expect(() => transitionException(createDraft(), 'approve')).toThrow(
      'Cannot approve exception e1 in state draft: expected state pending'
    );
  });

  it('refuses every action on a deactivated exception', () => {
    const inactive = createDraft({ active: false });
    for (const action of ['submit', 'approve', 'reject', 'deactivate'] as const) {
      expect(() => transitionException(inactive, action)).toThrow(ExceptionTransitionError);
    }
    expect(() => transitionException(inactive, 'submit')).toThrow(
      'Cannot submit exception e1 in state inactive: exception is deactivated'
    );
  });
});

describe('canTransition', () => {
  it('follows the workflow graph', () => {
    expect(canTransition(createDraft(), 'submit')).toBe(true);
    expect(canTransition(createDraft(), 'reject')).toBe(false);
    expect(canTransition(createDraft({ status: 'pending' }), 'reject')).toBe(true);
    expect(canTransition(createDraft({ status: 'rejected' }), 'deactivate')).toBe(true);
  });
});

describe('isTerminal', () => {
  it('is true for approved, rejected and deactivated exceptions', () => {
    expect(isTerminal(createDraft())).toBe(false);
    expect(isTerminal(createDraft({ status: 'pending' }))).toBe(false);
    expect(isTerminal(createDraft({ status: 'approved' }))).toBe(true);
    expect(isTerminal(createDraft({ status: 'rejected' }))).toBe(true);
    expect(isTerminal(createDraft({ active: false }))).toBe(true);
  });
});
