import { readFile } from 'node:fs/promises';
import type { PlannedDowntimeCalendar } from '@shift-rotation/shared';
import { formatIssues, plannedDowntimeCalendarSchema } from '../schemas.js';
import { EMPTY_DOWNTIME_CALENDAR } from './schedule-engine/planned-downtime.js';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Parse and validate a downtime calendar document
 */
export function parsePlannedDowntime(raw: unknown): PlannedDowntimeCalendar {
  const parsed = plannedDowntimeCalendarSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid planned downtime calendar: ${formatIssues(parsed.error).join('; ')}`);
  }
  return parsed.data;
}

/**
 * Load the downtime calendar from a JSON file.
 * A missing file means no planned downtime; a malformed one is an error.
 */
export async function loadPlannedDowntime(filePath: string): Promise<PlannedDowntimeCalendar> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      console.log(`loadPlannedDowntime: ${filePath} not found, no planned downtime`);
      return EMPTY_DOWNTIME_CALENDAR;
    }
    throw error;
  }

  const calendar = parsePlannedDowntime(JSON.parse(text));
  console.log(
    `loadPlannedDowntime: loaded version ${calendar.version} with ${calendar.periods.length} periods`
  );
  return calendar;
}
