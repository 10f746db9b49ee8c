import { describe, it, expect } from 'vitest';
import type { ScheduleAssignment } from '@shift-rotation/shared';
import { computeAssignmentStatus, createScheduleAssignment, retireAssignment } from './assignments.js';

const NOW = '2024-01-15T08:00:00.000Z';

// Helper to create a Q1 2024 assignment
function createAssignment(overrides: Partial<ScheduleAssignment> = {}): ScheduleAssignment {
  const assignment = createScheduleAssignment(
    {
      id: 'a1',
      userId: 'user-1',
      teamId: 'team-1',
      patternId: 'p1',
      startDate: '2024-01-01',
      endDate: '2024-03-31',
    },
    { now: NOW }
  );
  return { ...assignment, ...overrides };
}

describe('createScheduleAssignment', () => {
  it('fills defaults', () => {
    expect(createAssignment()).toEqual({
      id: 'a1',
      userId: 'user-1',
      teamId: 'team-1',
      patternId: 'p1',
      startDate: '2024-01-01',
      endDate: '2024-03-31',
      priority: 'normal',
      status: 'active',
      active: true,
      createdAt: NOW,
      updatedAt: NOW,
    });
  });

  it('starts as pending when the window opens later', () => {
    const assignment = createScheduleAssignment(
      { userId: 'user-1', teamId: 'team-1', patternId: 'p1', startDate: '2024-02-01' },
      { now: NOW }
    );
    expect(assignment.status).toBe('pending');
    expect(assignment.endDate).toBeNull();
  });

  it('takes the status from the local calendar date, not the UTC date of the timestamp', () => {
    const input = { userId: 'user-1', teamId: 'team-1', patternId: 'p1', startDate: '2024-02-01' };
    // 23:30 UTC on Jan 31 is already Feb 1 east of UTC
    const late = '2024-01-31T23:30:00.000Z';
    expect(createScheduleAssignment(input, { now: late, today: '2024-02-01' }).status).toBe('active');
    expect(createScheduleAssignment(input, { now: late, today: '2024-01-31' }).status).toBe('pending');
  });

  it('rejects a malformed current date', () => {
    expect(() =>
      createScheduleAssignment(
        { userId: 'user-1', teamId: 'team-1', patternId: 'p1', startDate: '2024-02-01' },
        { today: '2024-2-1' }
      )
    ).toThrow('Invalid current date: 2024-2-1');
  });

  it('rejects an end date before the start date', () => {
    expect(() =>
      createScheduleAssignment({
        userId: 'user-1',
        teamId: 'team-1',
        patternId: 'p1',
        startDate: '2024-02-01',
        endDate: '2024-01-31',
      })
    ).toThrow('End date 2024-01-31 is before start date 2024-02-01');
  });
});

describe('computeAssignmentStatus', () => {
  it('derives the status from the window', () => {
    const assignment = createAssignment();
    expect(computeAssignmentStatus(assignment, '2023-12-31')).toBe('pending');
    expect(computeAssignmentStatus(assignment, '2024-01-01')).toBe('active');
    expect(computeAssignmentStatus(assignment, '2024-03-31')).toBe('active');
    expect(computeAssignmentStatus(assignment, '2024-04-01')).toBe('expired');
  });

  it('reports inactive assignments as suspended and keeps cancellations', () => {
    expect(computeAssignmentStatus(createAssignment({ active: false }), '2024-02-01')).toBe('suspended');
    expect(computeAssignmentStatus(createAssignment({ status: 'cancelled' }), '2024-02-01')).toBe('cancelled');
  });
});

describe('retireAssignment', () => {
  it('soft-deletes without touching the window', () => {
    const retired = retireAssignment(createAssignment(), { now: '2024-02-01T00:00:00.000Z' });
    expect(retired).toMatchObject({
      id: 'a1',
      active: false,
      status: 'cancelled',
      startDate: '2024-01-01',
      endDate: '2024-03-31',
      updatedAt: '2024-02-01T00:00:00.000Z',
    });
  });
});
