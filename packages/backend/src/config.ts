import { fileURLToPath } from 'node:url';
import { isValidDateStr } from './services/schedule-engine/dates.js';
import { DEFAULT_COMPOSE_BATCH_SIZE } from './services/schedule-engine/composer.js';
import { DEFAULT_ROTATION_REFERENCE_DATE } from './services/schedule-engine/rotation.js';

export interface AppConfig {
  port: number;
  plannedDowntimeFile: string;
  composeBatchSize: number; // Dates per batch for async composition
  maxRangeDays: number; // Longest range a compose request may ask for
  rotationReferenceDate: string; // Day 1 of the fixed rotation
}

export const DEFAULT_PLANNED_DOWNTIME_FILE = fileURLToPath(
  new URL('../data/planned-downtime.json', import.meta.url)
);

function positiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Read configuration from environment variables, falling back to defaults
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rotationReferenceDate = env.ROTATION_REFERENCE_DATE || DEFAULT_ROTATION_REFERENCE_DATE;
  if (!isValidDateStr(rotationReferenceDate)) {
    throw new Error(`ROTATION_REFERENCE_DATE must be YYYY-MM-DD, got "${rotationReferenceDate}"`);
  }

  return {
    port: positiveInt('PORT', env.PORT, 8787),
    plannedDowntimeFile: env.PLANNED_DOWNTIME_FILE || DEFAULT_PLANNED_DOWNTIME_FILE,
    composeBatchSize: positiveInt('COMPOSE_BATCH_SIZE', env.COMPOSE_BATCH_SIZE, DEFAULT_COMPOSE_BATCH_SIZE),
    maxRangeDays: positiveInt('MAX_RANGE_DAYS', env.MAX_RANGE_DAYS, 366),
    rotationReferenceDate,
  };
}
