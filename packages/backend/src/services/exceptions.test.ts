import { describe, it, expect } from 'vitest';
import { InvalidExceptionError, createScheduleException, validateExceptionInput } from './exceptions.js';
import { isEffective } from './schedule-engine/exception-overlay.js';

const NOW = '2024-01-01T00:00:00.000Z';

describe('createScheduleException', () => {
  it('creates a vacation that is effective without approval', () => {
    const vacation = createScheduleException(
      { id: 'e1', userId: 'user-1', targetDate: '2024-01-10', exceptionType: 'absence_vacation' },
      { now: NOW }
    );
    expect(vacation).toMatchObject({
      id: 'e1',
      status: 'draft',
      requiresApproval: false,
      priority: 'normal',
      active: true,
      createdAt: NOW,
    });
    expect(isEffective(vacation)).toBe(true);
  });

  it('requires approval for changes and special absences by default', () => {
    const change = createScheduleException({
      userId: 'user-1',
      targetDate: '2024-01-10',
      exceptionType: 'change_company',
      newShiftId: 'night',
    });
    const special = createScheduleException({
      userId: 'user-1',
      targetDate: '2024-01-10',
      exceptionType: 'absence_special',
    });
    expect(change.requiresApproval).toBe(true);
    expect(special.requiresApproval).toBe(true);
    expect(isEffective(change)).toBe(false);
  });

  it('lets the caller override the approval default', () => {
    const sick = createScheduleException({
      userId: 'user-1',
      targetDate: '2024-01-10',
      exceptionType: 'absence_sick',
      requiresApproval: true,
    });
    expect(sick.requiresApproval).toBe(true);
  });

  it('throws with every problem found', () => {
    try {
      createScheduleException({ userId: 'user-1', targetDate: '2024-13-01', exceptionType: 'change_company' });
      expect.fail('expected an InvalidExceptionError');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidExceptionError);
      if (error instanceof InvalidExceptionError) {
        expect(error.problems).toEqual([
          'Invalid target date: 2024-13-01',
          'change_company needs newShiftId or swapWithUserId',
        ]);
      }
    }
  });
});

describe('validateExceptionInput', () => {
  it('requires a partner for swaps', () => {
    expect(
      validateExceptionInput({ userId: 'user-1', targetDate: '2024-01-10', exceptionType: 'change_swap' })
    ).toEqual(['A swap needs swapWithUserId']);
    expect(
      validateExceptionInput({
        userId: 'user-1',
        targetDate: '2024-01-10',
        exceptionType: 'change_swap',
        swapWithUserId: 'user-1',
      })
    ).toEqual(['A user cannot swap with themselves']);
  });

  it('requires a valid window for reductions', () => {
    expect(
      validateExceptionInput({
        userId: 'user-1',
        targetDate: '2024-01-10',
        exceptionType: 'reduction_union',
        newStartTime: '08:00',
      })
    ).toEqual(['reduction_union needs a valid newEndTime (HH:MM)']);
    expect(
      validateExceptionInput({
        userId: 'user-1',
        targetDate: '2024-01-10',
        exceptionType: 'reduction_personal',
        newStartTime: '08:00',
        newEndTime: '08:00',
      })
    ).toEqual(['Reduced window is empty']);
  });

  it('accepts an absence with no extra fields', () => {
    expect(
      validateExceptionInput({ userId: 'user-1', targetDate: '2024-01-10', exceptionType: 'absence_sick' })
    ).toEqual([]);
  });
});
