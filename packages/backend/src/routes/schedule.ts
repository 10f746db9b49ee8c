import { Hono } from 'hono';
import type { AppEnv } from '../index.js';
import { composeRequestSchema, resolveRequestSchema, rosterRequestSchema } from '../schemas.js';
import { readJsonBody } from './body.js';
import {
  composeRangeAsync,
  composeTeamRoster,
  daysBetween,
  resolveGoverningDetailed,
  summarizeSchedule,
} from '../services/schedule-engine/index.js';

const router = new Hono<AppEnv>();

// POST /api/schedule/compose - Compose a user's schedule over a date range
router.post('/compose', async (c) => {
  const body = await readJsonBody(c, composeRequestSchema);
  if (!body.success) {
    return c.json({ error: 'Invalid request body', details: body.errors }, 400);
  }

  const { userId, startDate, endDate, snapshot, includeStatistics } = body.data;
  const { maxRangeDays, composeBatchSize } = c.get('config');

  if (endDate < startDate) {
    return c.json({ error: `endDate ${endDate} is before startDate ${startDate}` }, 400);
  }
  const totalDays = daysBetween(startDate, endDate) + 1;
  if (totalDays > maxRangeDays) {
    return c.json({ error: `Range of ${totalDays} days exceeds the limit of ${maxRangeDays}` }, 400);
  }

  console.log(`compose: user ${userId} ${startDate}..${endDate} (${totalDays} days)`);
  const result = await composeRangeAsync(userId, startDate, endDate, snapshot, {
    downtime: c.get('downtime'),
    batchSize: composeBatchSize,
    signal: c.req.raw.signal,
  });

  if (result.errors.length > 0) {
    console.log(`compose: ${result.errors.length} errors for user ${userId}`);
  }

  return c.json(includeStatistics ? { ...result, statistics: summarizeSchedule(result.days) } : result);
});

// POST /api/schedule/roster - Team roster for one date, grouped by shift
router.post('/roster', async (c) => {
  const body = await readJsonBody(c, rosterRequestSchema);
  if (!body.success) {
    return c.json({ error: 'Invalid request body', details: body.errors }, 400);
  }

  const { teamId, date, snapshot } = body.data;
  const result = composeTeamRoster(teamId, date, snapshot, { downtime: c.get('downtime') });
  return c.json(result);
});

// POST /api/schedule/resolve - Governing assignment of a user on a date
router.post('/resolve', async (c) => {
  const body = await readJsonBody(c, resolveRequestSchema);
  if (!body.success) {
    return c.json({ error: 'Invalid request body', details: body.errors }, 400);
  }

  const { userId, date, assignments } = body.data;
  return c.json(resolveGoverningDetailed(userId, date, assignments));
});

export default router;
