import type {
  AssignmentWindow,
  ResolutionAmbiguity,
  ScheduleAssignment,
} from '@shift-rotation/shared';
import { ASSIGNMENT_PRIORITY_LEVELS } from '@shift-rotation/shared';
import { eachDate } from './dates.js';

export interface GoverningResolution {
  assignment: ScheduleAssignment | null;
  ambiguity: ResolutionAmbiguity | null;
}

/**
 * Whether an assignment can govern the user on this date
 */
export function coversDate(assignment: ScheduleAssignment, date: string): boolean {
  return (
    assignment.active &&
    assignment.startDate <= date &&
    (assignment.endDate === null || assignment.endDate >= date)
  );
}

/**
 * Ordering for governing candidates: highest priority first,
 * then the most recently started, then the smallest id.
 */
export function compareAssignments(a: ScheduleAssignment, b: ScheduleAssignment): number {
  const priorityDiff = ASSIGNMENT_PRIORITY_LEVELS[b.priority] - ASSIGNMENT_PRIORITY_LEVELS[a.priority];
  if (priorityDiff !== 0) return priorityDiff;
  if (a.startDate !== b.startDate) return a.startDate < b.startDate ? 1 : -1;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

/**
 * Pick the governing assignment and report a tie on priority and start date.
 * The result never depends on the order of `candidates`.
 */
export function resolveGoverningDetailed(
  userId: string,
  date: string,
  candidates: ScheduleAssignment[]
): GoverningResolution {
  const eligible = candidates
    .filter((a) => a.userId === userId && coversDate(a, date))
    .sort(compareAssignments);

  if (eligible.length === 0) {
    return { assignment: null, ambiguity: null };
  }

  const [selected, ...rest] = eligible;
  const tied = rest.filter(
    (a) =>
      a.id !== selected.id &&
      a.priority === selected.priority &&
      a.startDate === selected.startDate
  );

  return {
    assignment: selected,
    ambiguity:
      tied.length > 0
        ? {
            userId,
            date,
            selectedAssignmentId: selected.id,
            tiedAssignmentIds: tied.map((a) => a.id),
          }
        : null,
  };
}

/**
 * The single assignment that governs a user on a date, or null for none
 */
export function resolveGoverning(
  userId: string,
  date: string,
  candidates: ScheduleAssignment[]
): ScheduleAssignment | null {
  return resolveGoverningDetailed(userId, date, candidates).assignment;
}

/**
 * Governing assignment for every date of an inclusive range.
 * Each date is resolved on its own; a null entry is a gap.
 */
export function resolveRange(
  userId: string,
  startDate: string,
  endDate: string,
  candidates: ScheduleAssignment[]
): Map<string, ScheduleAssignment | null> {
  const ownCandidates = candidates.filter((a) => a.userId === userId);
  const result = new Map<string, ScheduleAssignment | null>();
  for (const date of eachDate(startDate, endDate)) {
    result.set(date, resolveGoverning(userId, date, ownCandidates));
  }
  return result;
}

function windowsIntersect(a: AssignmentWindow, b: AssignmentWindow): boolean {
  const aEndsBeforeB = a.endDate !== null && a.endDate < b.startDate;
  const bEndsBeforeA = b.endDate !== null && b.endDate < a.startDate;
  return !aEndsBeforeB && !bEndsBeforeA;
}

/**
 * Active assignments of the user whose validity window intersects `window`.
 * Callers use this before creating a new assignment; nothing here enforces it.
 */
export function findOverlaps(
  userId: string,
  window: AssignmentWindow,
  candidates: ScheduleAssignment[],
  excludingId?: string
): ScheduleAssignment[] {
  return candidates
    .filter(
      (a) =>
        a.userId === userId &&
        a.active &&
        a.id !== excludingId &&
        windowsIntersect(a, window)
    )
    .sort((a, b) => {
      if (a.startDate !== b.startDate) return a.startDate < b.startDate ? -1 : 1;
      if (a.id === b.id) return 0;
      return a.id < b.id ? -1 : 1;
    });
}
