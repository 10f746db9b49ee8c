import { Hono } from 'hono';
import type { AppEnv } from '../index.js';
import {
  ROTATION_CYCLE_LENGTH,
  isHalfTeamLetter,
  isValidDateStr,
  nextShiftDate,
  rotationRosterForDate,
} from '../services/schedule-engine/index.js';

const router = new Hono<AppEnv>();

// GET /api/rotation/:date - Which half-teams work each shift on a date
router.get('/:date', (c) => {
  const date = c.req.param('date');

  if (!isValidDateStr(date)) {
    return c.json({ error: `Invalid date: ${date}` }, 400);
  }

  return c.json(rotationRosterForDate(date, c.get('config').rotationReferenceDate));
});

// GET /api/rotation/teams/:team/next?from=YYYY-MM-DD - Next working date of a half-team
router.get('/teams/:team/next', (c) => {
  const team = c.req.param('team');
  const from = c.req.query('from');

  if (!isHalfTeamLetter(team)) {
    return c.json({ error: `Unknown half-team: ${team}` }, 404);
  }
  if (!from || !isValidDateStr(from)) {
    return c.json({ error: 'Missing or invalid query parameter: from' }, 400);
  }

  const date = nextShiftDate(team, from, ROTATION_CYCLE_LENGTH, c.get('config').rotationReferenceDate);
  return c.json({ team, from, date });
});

export default router;
