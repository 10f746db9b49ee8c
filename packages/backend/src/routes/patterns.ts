import { Hono } from 'hono';
import { z } from 'zod';
import type { AppEnv } from '../index.js';
import { createPatternInputSchema, dateString, evaluateRequestSchema } from '../schemas.js';
import { readJsonBody } from './body.js';
import { buildCustomPattern, createRecurrencePattern } from '../services/patterns.js';
import {
  PatternValidationError,
  daysBetween,
  evaluateRange,
  validatePattern,
} from '../services/schedule-engine/index.js';

const customPatternRequestSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  startDate: dateString,
  days: z.array(z.string().min(1).nullable()),
});

const router = new Hono<AppEnv>();

// POST /api/patterns/validate - Validate a pattern definition and return the normalized pattern
router.post('/validate', async (c) => {
  const body = await readJsonBody(c, createPatternInputSchema);
  if (!body.success) {
    return c.json({ error: 'Invalid request body', details: body.errors }, 400);
  }

  try {
    const pattern = createRecurrencePattern(body.data);
    return c.json({ valid: true, issues: [], pattern });
  } catch (error) {
    if (error instanceof PatternValidationError) {
      return c.json({ valid: false, issues: error.issues }, 422);
    }
    throw error;
  }
});

// POST /api/patterns/custom - Build a custom cycle from an ordered list of shifts
router.post('/custom', async (c) => {
  const body = await readJsonBody(c, customPatternRequestSchema);
  if (!body.success) {
    return c.json({ error: 'Invalid request body', details: body.errors }, 400);
  }

  try {
    return c.json(buildCustomPattern(body.data), 201);
  } catch (error) {
    if (error instanceof PatternValidationError) {
      return c.json({ valid: false, issues: error.issues }, 422);
    }
    throw error;
  }
});

// POST /api/patterns/evaluate - Evaluate a pattern on a date or an inclusive range
router.post('/evaluate', async (c) => {
  const body = await readJsonBody(c, evaluateRequestSchema);
  if (!body.success) {
    return c.json({ error: 'Invalid request body', details: body.errors }, 400);
  }

  const { pattern, startDate } = body.data;
  const endDate = body.data.endDate ?? startDate;

  const validation = validatePattern(pattern);
  if (!validation.valid) {
    return c.json({ valid: false, issues: validation.issues }, 422);
  }

  if (endDate < startDate) {
    return c.json({ error: `endDate ${endDate} is before startDate ${startDate}` }, 400);
  }
  const { maxRangeDays } = c.get('config');
  const totalDays = daysBetween(startDate, endDate) + 1;
  if (totalDays > maxRangeDays) {
    return c.json({ error: `Range of ${totalDays} days exceeds the limit of ${maxRangeDays}` }, 400);
  }

  const outcomes = Array.from(evaluateRange(pattern, startDate, endDate), ([date, outcome]) => ({
    date,
    outcome,
  }));
  return c.json({ patternId: pattern.id, outcomes });
});

export default router;
