/**
 * Priority used to pick the governing assignment among overlapping ones
 */
export type AssignmentPriority = 'low' | 'normal' | 'high' | 'override';

export const ASSIGNMENT_PRIORITY_LEVELS: Record<AssignmentPriority, number> = {
  low: 1,
  normal: 5,
  high: 8,
  override: 10,
};

export type AssignmentStatus = 'active' | 'pending' | 'expired' | 'suspended' | 'cancelled';

/**
 * ScheduleAssignment binds a user to a team and a recurrence pattern for a time window.
 * Assignments are never deleted while schedules may reference them;
 * `active=false` retires one without losing history.
 */
export interface ScheduleAssignment {
  id: string;
  userId: string;
  teamId: string;
  patternId: string;
  startDate: string; // ISO date (YYYY-MM-DD), inclusive
  endDate: string | null; // Inclusive, null = open-ended
  priority: AssignmentPriority;
  status: AssignmentStatus;
  active: boolean;
  createdAt: string;
  updatedAt: string;
}

/**
 * Validity window used when looking for overlapping assignments
 */
export interface AssignmentWindow {
  startDate: string;
  endDate: string | null;
}

/**
 * Two or more candidates tie on priority and start date for the same user and date.
 * The id tie-break still picks one, but the data likely needs attention upstream.
 */
export interface ResolutionAmbiguity {
  userId: string;
  date: string;
  selectedAssignmentId: string;
  tiedAssignmentIds: string[];
}

export interface CreateScheduleAssignmentInput {
  id?: string;
  userId: string;
  teamId: string;
  patternId: string;
  startDate: string;
  endDate?: string | null; // Defaults to null (open-ended)
  priority?: AssignmentPriority; // Defaults to 'normal'
}
