import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type {
  ComposeRangeResult,
  PlannedDowntimeCalendar,
  RecurrencePattern,
  ScheduleError,
  ScheduleException,
  ScheduleSnapshot,
  ScheduleWarning,
  Shift,
  ShiftOutcome,
  TeamRosterResult,
  UserDayResolution,
  WorkScheduleDay,
  WorkScheduleShift,
} from '@shift-rotation/shared';
import { resolveGoverningDetailed } from './assignment-resolver.js';
import { addDays, daysBetween, eachDate, isValidDateStr } from './dates.js';
import { composeWithBase, effectiveFor, isEffective } from './exception-overlay.js';
import type { OverlayResult } from './exception-overlay.js';
import { EMPTY_DOWNTIME_CALENDAR, isPlannedDowntime } from './planned-downtime.js';
import { evaluate } from './recurrence.js';

export interface ComposeOptions {
  downtime?: PlannedDowntimeCalendar;
}

export interface ComposeAsyncOptions extends ComposeOptions {
  batchSize?: number; // Dates per batch, defaults to 31
  signal?: AbortSignal; // Checked between batches
}

export const DEFAULT_COMPOSE_BATCH_SIZE = 31;

interface CompositionContext {
  snapshot: ScheduleSnapshot;
  patternsById: Map<string, RecurrencePattern>;
  shiftsById: Map<string, Shift>;
  downtime: PlannedDowntimeCalendar;
}

function createContext(snapshot: ScheduleSnapshot, options: ComposeOptions): CompositionContext {
  return {
    snapshot,
    patternsById: new Map(snapshot.patterns.map((p) => [p.id, p])),
    shiftsById: new Map(snapshot.shifts.map((s) => [s.id, s])),
    downtime: options.downtime ?? EMPTY_DOWNTIME_CALENDAR,
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

type PartnerBase = { outcome: ShiftOutcome } | { outcome: null; reason: string };

/**
 * Base outcome of a user on a date (governing assignment + pattern), without exceptions.
 * Carries the reason when it cannot be determined from the snapshot.
 */
function baseOutcomeFor(userId: string, date: string, ctx: CompositionContext): PartnerBase {
  const { assignment } = resolveGoverningDetailed(userId, date, ctx.snapshot.assignments);
  if (!assignment) return { outcome: null, reason: `no governing assignment for ${userId}` };
  const pattern = ctx.patternsById.get(assignment.patternId);
  if (!pattern) return { outcome: null, reason: `pattern ${assignment.patternId} is not in the snapshot` };
  try {
    return { outcome: evaluate(pattern, date) };
  } catch (error) {
    return { outcome: null, reason: describeError(error) };
  }
}

/**
 * Overlay a user's own effective exceptions on their base outcome, without
 * swaps filed by other users
 */
function overlayOwnExceptions(
  userId: string,
  date: string,
  baseOutcome: ShiftOutcome,
  ctx: CompositionContext,
  extra: ScheduleException[] = []
): { overlay: OverlayResult; partnerFailures: Map<string, string> } {
  const partnerFailures = new Map<string, string>();
  const overlay = composeWithBase(baseOutcome, [...effectiveFor(userId, date, ctx.snapshot.exceptions), ...extra], {
    lookupSwapOutcome: (partnerUserId) => {
      const partner = baseOutcomeFor(partnerUserId, date, ctx);
      if (partner.outcome === null) partnerFailures.set(partnerUserId, partner.reason);
      return partner.outcome;
    },
  });
  return { overlay, partnerFailures };
}

/**
 * Swaps filed by other users naming this user as partner, mirrored onto this
 * user so that both sides move. Only swaps that took effect for the
 * requester are mirrored.
 */
function incomingSwaps(userId: string, date: string, ctx: CompositionContext): ScheduleException[] {
  return ctx.snapshot.exceptions
    .filter(
      (e) =>
        e.exceptionType === 'change_swap' &&
        !e.newShiftId &&
        e.swapWithUserId === userId &&
        e.userId !== userId &&
        e.targetDate === date &&
        isEffective(e)
    )
    .filter((swap) => {
      const requester = baseOutcomeFor(swap.userId, date, ctx);
      if (requester.outcome === null) return false;
      const { overlay } = overlayOwnExceptions(swap.userId, date, requester.outcome, ctx);
      return overlay.appliedExceptionIds.includes(swap.id);
    })
    .map((swap) => ({ ...swap, userId, swapWithUserId: swap.userId }));
}

/**
 * Resolve one user on one date: governing assignment, pattern evaluation,
 * then exception overlay. Failures are recorded on the entry, never thrown.
 */
function resolveUserDay(userId: string, date: string, ctx: CompositionContext): UserDayResolution {
  const { assignment, ambiguity } = resolveGoverningDetailed(userId, date, ctx.snapshot.assignments);
  const resolution: UserDayResolution = {
    userId,
    date,
    assignment,
    baseOutcome: { kind: 'rest', reason: 'no_assignment' },
    outcome: { kind: 'rest', reason: 'no_assignment' },
    startTime: null,
    endTime: null,
    appliedExceptionIds: [],
    conflicts: [],
    ambiguity,
    errors: [],
  };

  if (!assignment) {
    return resolution;
  }

  const pattern = ctx.patternsById.get(assignment.patternId);
  if (!pattern) {
    resolution.baseOutcome = { kind: 'rest', reason: 'pattern' };
    resolution.outcome = resolution.baseOutcome;
    resolution.errors.push({
      type: 'pattern_not_found',
      message: `Pattern ${assignment.patternId} of assignment ${assignment.id} is not in the snapshot`,
      details: { userId, date, assignmentId: assignment.id, patternId: assignment.patternId },
    });
    return resolution;
  }

  try {
    resolution.baseOutcome = evaluate(pattern, date);
  } catch (error) {
    resolution.baseOutcome = { kind: 'rest', reason: 'pattern' };
    resolution.outcome = resolution.baseOutcome;
    resolution.errors.push({
      type: 'evaluation_failed',
      message: describeError(error),
      details: { userId, date, assignmentId: assignment.id, patternId: pattern.id },
    });
    return resolution;
  }

  const mirroredSwaps = incomingSwaps(userId, date, ctx);
  const { overlay, partnerFailures } = overlayOwnExceptions(userId, date, resolution.baseOutcome, ctx, mirroredSwaps);

  resolution.outcome = overlay.outcome;
  resolution.appliedExceptionIds = overlay.appliedExceptionIds;
  resolution.conflicts = overlay.conflicts;

  for (const exceptionId of overlay.unresolvedSwapIds) {
    const swap = [...mirroredSwaps, ...ctx.snapshot.exceptions].find(
      (e) => e.id === exceptionId && e.userId === userId
    );
    const partnerUserId = swap?.swapWithUserId ?? '';
    const reason = partnerFailures.get(partnerUserId) ?? 'no partner named';
    resolution.errors.push({
      type: 'swap_partner_unresolved',
      message: `Swap partner of exception ${exceptionId} has no resolvable shift on ${date}: ${reason}`,
      details: { userId, date, exceptionId, partnerUserId, reason },
    });
  }

  if (resolution.outcome.kind === 'work') {
    const shift = ctx.shiftsById.get(resolution.outcome.shiftId);
    if (!shift) {
      resolution.errors.push({
        type: 'shift_not_found',
        message: `Shift ${resolution.outcome.shiftId} is not in the snapshot`,
        details: { userId, date, shiftId: resolution.outcome.shiftId },
      });
    }
    resolution.startTime = overlay.timeWindow?.startTime ?? shift?.startTime ?? null;
    resolution.endTime = overlay.timeWindow?.endTime ?? shift?.endTime ?? null;
  }

  return resolution;
}

function byString(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Group per-user resolutions of one date into the day view.
 * Shifts are ordered by sortOrder, members and rest users by user id.
 */
function buildDay(date: string, resolutions: UserDayResolution[], ctx: CompositionContext): WorkScheduleDay {
  const shifts = new Map<string, WorkScheduleShift>();
  const restUserIds: string[] = [];

  for (const resolution of [...resolutions].sort((a, b) => byString(a.userId, b.userId))) {
    const { outcome, assignment } = resolution;
    if (outcome.kind === 'rest' || !assignment) {
      restUserIds.push(resolution.userId);
      continue;
    }

    let entry = shifts.get(outcome.shiftId);
    if (!entry) {
      const shift = ctx.shiftsById.get(outcome.shiftId);
      const sortOrder = shift?.sortOrder ?? Number.MAX_SAFE_INTEGER;
      entry = {
        shiftId: outcome.shiftId,
        shiftName: shift?.name ?? outcome.shiftId,
        sortOrder,
        members: [],
        teamIds: [],
        plannedDowntime: shift ? isPlannedDowntime(ctx.downtime, date, sortOrder) : false,
      };
      shifts.set(outcome.shiftId, entry);
    }

    entry.members.push({
      userId: resolution.userId,
      teamId: assignment.teamId,
      assignmentId: assignment.id,
      startTime: resolution.startTime ?? '',
      endTime: resolution.endTime ?? '',
      exceptionIds: resolution.appliedExceptionIds,
    });
    if (!entry.teamIds.includes(assignment.teamId)) {
      entry.teamIds.push(assignment.teamId);
      entry.teamIds.sort(byString);
    }
  }

  return {
    date,
    shifts: Array.from(shifts.values()).sort(
      (a, b) => a.sortOrder - b.sortOrder || byString(a.shiftId, b.shiftId)
    ),
    restUserIds,
    conflicts: resolutions.flatMap((r) => r.conflicts),
    errors: resolutions.flatMap((r) => r.errors),
  };
}

function collectWarnings(resolutions: UserDayResolution[]): ScheduleWarning[] {
  const warnings: ScheduleWarning[] = [];
  for (const resolution of resolutions) {
    if (resolution.ambiguity) {
      warnings.push({
        type: 'resolution_ambiguity',
        message: `Assignments tie on priority and start date for user ${resolution.userId} on ${resolution.date}; picked ${resolution.ambiguity.selectedAssignmentId}`,
        details: {
          userId: resolution.userId,
          date: resolution.date,
          selectedAssignmentId: resolution.ambiguity.selectedAssignmentId,
          tiedAssignmentIds: resolution.ambiguity.tiedAssignmentIds,
        },
      });
    }
    for (const conflict of resolution.conflicts) {
      warnings.push({
        type: 'exception_conflict',
        message: conflict.description,
        details: { userId: conflict.userId, date: conflict.date, exceptionIds: [...conflict.exceptionIds] },
      });
    }
  }
  return warnings;
}

function validateRange(startDate: string, endDate: string): ScheduleError | null {
  if (!isValidDateStr(startDate) || !isValidDateStr(endDate)) {
    return {
      type: 'invalid_request',
      message: `Invalid date range: ${startDate} to ${endDate}`,
      details: { startDate, endDate },
    };
  }
  if (endDate < startDate) {
    return {
      type: 'invalid_request',
      message: `End date ${endDate} is before start date ${startDate}`,
      details: { startDate, endDate },
    };
  }
  return null;
}

function composeDates(
  userId: string,
  dates: string[],
  ctx: CompositionContext
): { days: WorkScheduleDay[]; resolutions: UserDayResolution[] } {
  const resolutions = dates.map((date) => resolveUserDay(userId, date, ctx));
  const days = resolutions.map((resolution) => buildDay(resolution.date, [resolution], ctx));
  return { days, resolutions };
}

function rangeResult(
  userId: string,
  startDate: string,
  endDate: string,
  days: WorkScheduleDay[],
  resolutions: UserDayResolution[]
): ComposeRangeResult {
  const errors = days.flatMap((d) => d.errors);
  return {
    success: errors.length === 0,
    userId,
    startDate,
    endDate,
    days,
    errors,
    warnings: collectWarnings(resolutions),
  };
}

/**
 * Compose a user's schedule for every date of an inclusive range.
 * Always returns daysBetween(start, end) + 1 days; per-date failures are
 * collected in the result instead of aborting the range.
 */
export function composeRange(
  userId: string,
  startDate: string,
  endDate: string,
  snapshot: ScheduleSnapshot,
  options: ComposeOptions = {}
): ComposeRangeResult {
  const invalid = validateRange(startDate, endDate);
  if (invalid) {
    return { success: false, userId, startDate, endDate, days: [], errors: [invalid], warnings: [] };
  }

  const ctx = createContext(snapshot, options);
  const { days, resolutions } = composeDates(userId, eachDate(startDate, endDate), ctx);
  return rangeResult(userId, startDate, endDate, days, resolutions);
}

/**
 * Same as composeRange, computed in date batches. The signal is checked
 * between batches; an aborted run resolves with the days finished so far
 * and `cancelled: true`.
 */
export async function composeRangeAsync(
  userId: string,
  startDate: string,
  endDate: string,
  snapshot: ScheduleSnapshot,
  options: ComposeAsyncOptions = {}
): Promise<ComposeRangeResult> {
  const invalid = validateRange(startDate, endDate);
  if (invalid) {
    return { success: false, userId, startDate, endDate, days: [], errors: [invalid], warnings: [] };
  }

  const ctx = createContext(snapshot, options);
  const batchSize = Math.max(1, options.batchSize ?? DEFAULT_COMPOSE_BATCH_SIZE);
  const totalDays = daysBetween(startDate, endDate) + 1;
  const days: WorkScheduleDay[] = [];
  const resolutions: UserDayResolution[] = [];

  for (let offset = 0; offset < totalDays; offset += batchSize) {
    if (options.signal?.aborted) {
      return { ...rangeResult(userId, startDate, endDate, days, resolutions), cancelled: true };
    }

    const batchEnd = addDays(startDate, Math.min(offset + batchSize, totalDays) - 1);
    const batch = composeDates(userId, eachDate(addDays(startDate, offset), batchEnd), ctx);
    days.push(...batch.days);
    resolutions.push(...batch.resolutions);

    await yieldToEventLoop();
  }

  return rangeResult(userId, startDate, endDate, days, resolutions);
}

/**
 * Compose one date for a set of users (all users of the snapshot by default)
 */
export function composeDay(
  date: string,
  snapshot: ScheduleSnapshot,
  options: ComposeOptions = {},
  userIds?: string[]
): { day: WorkScheduleDay; warnings: ScheduleWarning[] } {
  const ctx = createContext(snapshot, options);
  const users = userIds ?? Array.from(new Set(snapshot.assignments.map((a) => a.userId)));
  const resolutions = users.map((userId) => resolveUserDay(userId, date, ctx));
  return { day: buildDay(date, resolutions, ctx), warnings: collectWarnings(resolutions) };
}

/**
 * Full roster of a team on a date, grouped by shift.
 * A user counts for the team only when their governing assignment on that
 * date belongs to it.
 */
export function composeTeamRoster(
  teamId: string,
  date: string,
  snapshot: ScheduleSnapshot,
  options: ComposeOptions = {}
): TeamRosterResult {
  if (!isValidDateStr(date)) {
    const error: ScheduleError = { type: 'invalid_request', message: `Invalid date: ${date}`, details: { date } };
    return {
      success: false,
      teamId,
      date,
      day: { date, shifts: [], restUserIds: [], conflicts: [], errors: [error] },
      errors: [error],
      warnings: [],
    };
  }

  const ctx = createContext(snapshot, options);
  const teamUserIds = Array.from(
    new Set(snapshot.assignments.filter((a) => a.teamId === teamId).map((a) => a.userId))
  );
  const resolutions = teamUserIds
    .map((userId) => resolveUserDay(userId, date, ctx))
    .filter((r) => r.assignment?.teamId === teamId);

  const day = buildDay(date, resolutions, ctx);
  return {
    success: day.errors.length === 0,
    teamId,
    date,
    day,
    errors: day.errors,
    warnings: collectWarnings(resolutions),
  };
}
