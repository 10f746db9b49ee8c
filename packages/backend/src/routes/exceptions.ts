import { Hono } from 'hono';
import type { AppEnv } from '../index.js';
import {
  conflictsRequestSchema,
  createExceptionRequestSchema,
  effectiveRequestSchema,
  transitionRequestSchema,
} from '../schemas.js';
import { readJsonBody } from './body.js';
import { InvalidExceptionError, createScheduleException } from '../services/exceptions.js';
import {
  ExceptionTransitionError,
  detectExceptionConflict,
  effectiveFor,
  transitionException,
} from '../services/schedule-engine/index.js';

const router = new Hono<AppEnv>();

// POST /api/exceptions - Create a draft exception with per-type defaults
router.post('/', async (c) => {
  const body = await readJsonBody(c, createExceptionRequestSchema);
  if (!body.success) {
    return c.json({ error: 'Invalid request body', details: body.errors }, 400);
  }

  try {
    return c.json(createScheduleException(body.data), 201);
  } catch (error) {
    if (error instanceof InvalidExceptionError) {
      return c.json({ error: 'Invalid exception', details: error.problems }, 400);
    }
    throw error;
  }
});

// POST /api/exceptions/effective - Effective exceptions of a user on a date, in precedence order
router.post('/effective', async (c) => {
  const body = await readJsonBody(c, effectiveRequestSchema);
  if (!body.success) {
    return c.json({ error: 'Invalid request body', details: body.errors }, 400);
  }

  const { userId, date, exceptions } = body.data;
  return c.json({ exceptions: effectiveFor(userId, date, exceptions) });
});

// POST /api/exceptions/conflicts - Equal-priority incompatible exceptions
router.post('/conflicts', async (c) => {
  const body = await readJsonBody(c, conflictsRequestSchema);
  if (!body.success) {
    return c.json({ error: 'Invalid request body', details: body.errors }, 400);
  }

  return c.json({ conflicts: detectExceptionConflict(body.data.exceptions) });
});

// POST /api/exceptions/transition - Apply a workflow action
router.post('/transition', async (c) => {
  const body = await readJsonBody(c, transitionRequestSchema);
  if (!body.success) {
    return c.json({ error: 'Invalid request body', details: body.errors }, 400);
  }

  const { exception, action, actorUserId, reason } = body.data;
  try {
    const updated = transitionException(exception, action, { actorUserId, reason });
    console.log(`transition: ${action} exception ${exception.id} -> ${updated.active ? updated.status : 'inactive'}`);
    return c.json(updated);
  } catch (error) {
    if (error instanceof ExceptionTransitionError) {
      return c.json({ error: error.message, from: error.from, action: error.action }, 409);
    }
    throw error;
  }
});

export default router;
