import type {
  ExceptionCategory,
  ExceptionConflict,
  ExceptionType,
  ScheduleException,
  ShiftOutcome,
  TimeWindow,
} from '@shift-rotation/shared';
import { EXCEPTION_PRIORITY_LEVELS } from '@shift-rotation/shared';

export function exceptionCategory(type: ExceptionType): ExceptionCategory {
  if (type.startsWith('absence_')) return 'absence';
  if (type.startsWith('change_')) return 'change';
  return 'reduction';
}

/**
 * An exception overrides the schedule only when it is active and either
 * approved, or a draft that never needed approval.
 */
export function isEffective(exception: ScheduleException): boolean {
  return (
    exception.active &&
    (exception.status === 'approved' ||
      (exception.status === 'draft' && !exception.requiresApproval))
  );
}

function priorityLevel(exception: ScheduleException): number {
  return EXCEPTION_PRIORITY_LEVELS[exception.priority];
}

/**
 * Priority descending, then target date, then id
 */
export function compareExceptions(a: ScheduleException, b: ScheduleException): number {
  const diff = priorityLevel(b) - priorityLevel(a);
  if (diff !== 0) return diff;
  if (a.targetDate !== b.targetDate) return a.targetDate < b.targetDate ? -1 : 1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/**
 * Effective exceptions of a user on a date, in precedence order
 */
export function effectiveFor(
  userId: string,
  date: string,
  candidates: ScheduleException[]
): ScheduleException[] {
  return candidates
    .filter((e) => e.userId === userId && e.targetDate === date && isEffective(e))
    .sort(compareExceptions);
}

function changeTarget(exception: ScheduleException): string {
  return exception.newShiftId ? `shift:${exception.newShiftId}` : `swap:${exception.swapWithUserId ?? ''}`;
}

function reductionWindow(exception: ScheduleException): string {
  return `${exception.newStartTime ?? ''}-${exception.newEndTime ?? ''}`;
}

/**
 * Whether two exceptions ask for overrides that cannot both hold on one date.
 * Absences combine with each other; a change combines with a reduction.
 */
export function areIncompatible(a: ScheduleException, b: ScheduleException): boolean {
  const catA = exceptionCategory(a.exceptionType);
  const catB = exceptionCategory(b.exceptionType);

  if (catA === 'absence' || catB === 'absence') {
    return catA !== catB;
  }
  if (catA === 'change' && catB === 'change') {
    return changeTarget(a) !== changeTarget(b);
  }
  if (catA === 'reduction' && catB === 'reduction') {
    return reductionWindow(a) !== reductionWindow(b);
  }
  return false;
}

function describeConflict(a: ScheduleException, b: ScheduleException): ExceptionConflict {
  const [first, second] = a.id < b.id ? [a, b] : [b, a];
  return {
    userId: first.userId,
    date: first.targetDate,
    exceptionIds: [first.id, second.id],
    description: `${first.exceptionType} (${first.id}) and ${second.exceptionType} (${second.id}) have equal ${first.priority} priority and incompatible overrides`,
  };
}

function equalPriorityConflicts(sorted: ScheduleException[]): ExceptionConflict[] {
  const conflicts: ExceptionConflict[] = [];
  for (let i = 0; i < sorted.length; i++) {
    for (let j = i + 1; j < sorted.length; j++) {
      if (priorityLevel(sorted[i]) === priorityLevel(sorted[j]) && areIncompatible(sorted[i], sorted[j])) {
        conflicts.push(describeConflict(sorted[i], sorted[j]));
      }
    }
  }
  return conflicts;
}

/**
 * Equal-priority effective exceptions of the same user and date that cannot both apply
 */
export function detectExceptionConflict(exceptions: ScheduleException[]): ExceptionConflict[] {
  const groups = new Map<string, ScheduleException[]>();
  for (const exception of exceptions.filter(isEffective)) {
    const key = `${exception.userId}|${exception.targetDate}`;
    const group = groups.get(key) ?? [];
    group.push(exception);
    groups.set(key, group);
  }

  return Array.from(groups.keys())
    .sort()
    .flatMap((key) => equalPriorityConflicts((groups.get(key) ?? []).sort(compareExceptions)));
}

export interface OverlayOptions {
  /**
   * Base outcome of a swap partner on the same date, or null when the
   * partner cannot be resolved from the snapshot
   */
  lookupSwapOutcome?: (partnerUserId: string) => ShiftOutcome | null;
}

export interface OverlayResult {
  outcome: ShiftOutcome;
  timeWindow: TimeWindow | null; // Set when a reduction applies to a work outcome
  appliedExceptionIds: string[];
  overriddenExceptionIds: string[];
  conflicts: ExceptionConflict[];
  unresolvedSwapIds: string[];
}

function isAbsence(exception: ScheduleException): boolean {
  return exceptionCategory(exception.exceptionType) === 'absence';
}

/**
 * Overlay effective exceptions on a base outcome.
 *
 * Any effective absence forces rest, whatever the priority of the changes and
 * reductions next to it; those are overridden and equal-priority clashes are
 * still reported. Otherwise exceptions are taken in precedence order. One that
 * clashes with an accepted exception of higher priority is overridden. A clash
 * at equal priority is a conflict: both are withheld, reported, and still
 * block lower ones.
 */
export function composeWithBase(
  baseOutcome: ShiftOutcome,
  effectiveExceptions: ScheduleException[],
  options: OverlayOptions = {}
): OverlayResult {
  const sorted = [...effectiveExceptions].sort(compareExceptions);

  const absences = sorted.filter(isAbsence);
  if (absences.length > 0) {
    return {
      outcome: { kind: 'rest', reason: 'absence' },
      timeWindow: null,
      appliedExceptionIds: absences.map((e) => e.id),
      overriddenExceptionIds: sorted.filter((e) => !isAbsence(e)).map((e) => e.id),
      conflicts: equalPriorityConflicts(sorted),
      unresolvedSwapIds: [],
    };
  }

  const accepted: ScheduleException[] = [];
  const withheld: ScheduleException[] = [];
  const overriddenExceptionIds: string[] = [];
  const conflicts: ExceptionConflict[] = [];

  for (const exception of sorted) {
    const blockers = [...accepted, ...withheld].filter((other) => areIncompatible(other, exception));
    if (blockers.length === 0) {
      accepted.push(exception);
      continue;
    }

    if (blockers.some((other) => priorityLevel(other) > priorityLevel(exception))) {
      overriddenExceptionIds.push(exception.id);
      continue;
    }

    for (const other of blockers) {
      conflicts.push(describeConflict(other, exception));
      const index = accepted.indexOf(other);
      if (index !== -1) {
        accepted.splice(index, 1);
        withheld.push(other);
      }
    }
    withheld.push(exception);
  }

  const result: OverlayResult = {
    outcome: baseOutcome,
    timeWindow: null,
    appliedExceptionIds: [],
    overriddenExceptionIds,
    conflicts,
    unresolvedSwapIds: [],
  };

  const changes = accepted.filter((e) => exceptionCategory(e.exceptionType) === 'change');
  if (changes.length > 0) {
    const change = changes[0];
    let target: ShiftOutcome | null = null;
    if (change.newShiftId) {
      target = { kind: 'work', shiftId: change.newShiftId };
    } else if (change.swapWithUserId && options.lookupSwapOutcome) {
      target = options.lookupSwapOutcome(change.swapWithUserId);
    }

    if (target) {
      result.outcome = target;
      result.appliedExceptionIds.push(...changes.map((e) => e.id));
    } else {
      result.unresolvedSwapIds.push(...changes.map((e) => e.id));
    }
  }

  const reduction = accepted.find((e) => exceptionCategory(e.exceptionType) === 'reduction');
  if (reduction && result.outcome.kind === 'work' && reduction.newStartTime && reduction.newEndTime) {
    result.timeWindow = { startTime: reduction.newStartTime, endTime: reduction.newEndTime };
    result.appliedExceptionIds.push(
      ...accepted
        .filter((e) => exceptionCategory(e.exceptionType) === 'reduction')
        .map((e) => e.id)
    );
  }

  return result;
}
