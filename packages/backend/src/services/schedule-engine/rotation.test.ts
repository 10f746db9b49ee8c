import { describe, it, expect } from 'vitest';
import {
  DEFAULT_ROTATION_SHIFTS,
  HALF_TEAMS,
  ROTATION_CYCLE_LENGTH,
  buildRotationPattern,
  buildRotationPatterns,
  isHalfTeamLetter,
  nextShiftDate,
  rotateArray,
  rotationCycleIndex,
  rotationRosterForDate,
  shiftIndexForTeam,
} from './rotation.js';
import { addDays, eachDate } from './dates.js';
import { evaluate } from './recurrence.js';

describe('rotationCycleIndex', () => {
  it('is 0 on the reference date and wraps every cycle', () => {
    expect(rotationCycleIndex('2018-11-07')).toBe(0);
    expect(rotationCycleIndex('2018-11-25')).toBe(0);
    expect(rotationCycleIndex('2018-11-08')).toBe(1);
  });

  it('wraps correctly for dates before the reference date', () => {
    expect(rotationCycleIndex('2018-11-06')).toBe(17);
    expect(rotationCycleIndex('2018-10-20')).toBe(0);
  });
});

describe('rotationRosterForDate', () => {
  it('lists teams per shift on the reference date', () => {
    expect(rotationRosterForDate('2018-11-07')).toEqual({
      date: '2018-11-07',
      cycleDay: 1,
      shifts: [['A', 'B'], ['C', 'D'], ['E', 'F']],
      offDuty: ['G', 'H', 'I'],
    });
  });

  it('moves to the next pair of rows every two days', () => {
    const roster = rotationRosterForDate('2018-11-09');
    expect(roster.cycleDay).toBe(3);
    expect(roster.shifts).toEqual([['A', 'H'], ['D', 'I'], ['G', 'F']]);
    expect(roster.offDuty).toEqual(['B', 'C', 'E']);
  });

  it('has every half-team exactly once per day', () => {
    for (const date of eachDate('2018-11-07', addDays('2018-11-07', ROTATION_CYCLE_LENGTH - 1))) {
      const roster = rotationRosterForDate(date);
      const seen = [...roster.shifts.flat(), ...roster.offDuty].sort();
      expect(seen).toEqual([...HALF_TEAMS]);
      expect(roster.shifts.map((teams) => teams.length)).toEqual([2, 2, 2]);
    }
  });

  it('works each half-team four days on and two days off', () => {
    for (const team of HALF_TEAMS) {
      let worked = 0;
      for (let i = 0; i < ROTATION_CYCLE_LENGTH; i++) {
        if (shiftIndexForTeam(i, team) !== null) worked++;
      }
      expect(worked).toBe(12);
    }
  });

  it('honours a custom reference date', () => {
    expect(rotationRosterForDate('2024-01-01', '2024-01-01').cycleDay).toBe(1);
  });
});

describe('shiftIndexForTeam', () => {
  it('returns the shift position or null on rest days', () => {
    expect(shiftIndexForTeam(0, 'A')).toBe(0);
    expect(shiftIndexForTeam(4, 'A')).toBeNull();
    expect(shiftIndexForTeam(6, 'A')).toBe(2);
    expect(shiftIndexForTeam(12, 'A')).toBe(1);
  });
});

describe('nextShiftDate', () => {
  it('finds the first working date on or after a date', () => {
    expect(nextShiftDate('A', '2018-11-07')).toBe('2018-11-07');
    expect(nextShiftDate('A', '2018-11-11')).toBe('2018-11-13');
  });

  it('gives up after maxDays', () => {
    expect(nextShiftDate('A', '2018-11-11', 2)).toBeNull();
  });
});

describe('rotateArray', () => {
  it('rotates left for positive and right for negative offsets', () => {
    expect(rotateArray([1, 2, 3], 1)).toEqual([2, 3, 1]);
    expect(rotateArray([1, 2, 3], -1)).toEqual([3, 1, 2]);
    expect(rotateArray([1, 2, 3], 3)).toEqual([1, 2, 3]);
  });
});

describe('isHalfTeamLetter', () => {
  it('accepts A to I only', () => {
    expect(isHalfTeamLetter('A')).toBe(true);
    expect(isHalfTeamLetter('I')).toBe(true);
    expect(isHalfTeamLetter('J')).toBe(false);
    expect(isHalfTeamLetter('a')).toBe(false);
  });
});

describe('buildRotationPattern', () => {
  it('expands a half-team into an 18-day cycle', () => {
    const pattern = buildRotationPattern('A', { createdAt: '2024-01-01T00:00:00Z' });
    expect(pattern.id).toBe('rotation-A');
    expect(pattern.frequency).toBe('rotation_cycle');
    expect(pattern.startDate).toBe('2018-11-07');
    expect(pattern.cycleLength).toBe(18);
    expect(pattern.patternDays?.map((d) => d.shiftId)).toEqual([
      'morning', 'morning', 'morning', 'morning', null, null,
      'night', 'night', 'night', 'night', null, null,
      'afternoon', 'afternoon', 'afternoon', 'afternoon', null, null,
    ]);
  });

  it('agrees with the roster on every date', () => {
    for (const team of HALF_TEAMS) {
      const pattern = buildRotationPattern(team);
      for (const date of eachDate('2018-11-07', '2018-12-31')) {
        const shiftIndex = shiftIndexForTeam(rotationCycleIndex(date), team);
        const expected =
          shiftIndex === null
            ? { kind: 'rest', reason: 'pattern' }
            : { kind: 'work', shiftId: DEFAULT_ROTATION_SHIFTS[shiftIndex].id };
        expect(evaluate(pattern, date)).toEqual(expected);
      }
    }
  });

  it('aligns day 1 with a later start date', () => {
    const pattern = buildRotationPattern('A', { startDate: '2018-11-11' });
    expect(pattern.patternDays?.[0].shiftId).toBeNull();
    expect(pattern.patternDays?.[2].shiftId).toBe('night');
    expect(evaluate(pattern, '2018-11-10')).toEqual({ kind: 'rest', reason: 'out_of_range' });
    expect(evaluate(pattern, '2018-11-13')).toEqual({ kind: 'work', shiftId: 'night' });
  });

  it('requires three shifts', () => {
    expect(() => buildRotationPattern('A', { shifts: DEFAULT_ROTATION_SHIFTS.slice(0, 2) })).toThrow(
      'The rotation needs 3 shifts, got 2'
    );
  });

  it('builds one pattern per half-team', () => {
    expect(buildRotationPatterns().map((p) => p.id)).toEqual(HALF_TEAMS.map((t) => `rotation-${t}`));
  });
});
