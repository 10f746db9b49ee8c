import type { Context } from 'hono';
import type { z } from 'zod';
import type { AppEnv } from '../index.js';
import { formatIssues } from '../schemas.js';

export type BodyResult<T> = { success: true; data: T } | { success: false; errors: string[] };

/**
 * Read the JSON body and validate it against a schema
 */
export async function readJsonBody<T extends z.ZodTypeAny>(
  c: Context<AppEnv>,
  schema: T
): Promise<BodyResult<z.output<T>>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    return { success: false, errors: ['Request body must be valid JSON'] };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { success: false, errors: formatIssues(parsed.error) };
  }
  return { success: true, data: parsed.data };
}
