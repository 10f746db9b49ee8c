import { randomUUID } from 'node:crypto';

/**
 * Generate a unique ID for a new record
 */
export function generateId(): string {
  return randomUUID();
}
