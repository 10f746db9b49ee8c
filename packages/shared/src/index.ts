export * from './types/shift.js';
export * from './types/team.js';
export * from './types/recurrence-pattern.js';
export * from './types/schedule-assignment.js';
export * from './types/schedule-exception.js';
export * from './types/planned-downtime.js';
export * from './types/work-schedule.js';
