import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { PlannedDowntimeCalendar } from '@shift-rotation/shared';
import type { AppConfig } from './config.js';
import { EMPTY_DOWNTIME_CALENDAR } from './services/schedule-engine/planned-downtime.js';
import scheduleRouter from './routes/schedule.js';
import patternsRouter from './routes/patterns.js';
import exceptionsRouter from './routes/exceptions.js';
import rotationRouter from './routes/rotation.js';

export type AppEnv = {
  Variables: {
    config: AppConfig;
    downtime: PlannedDowntimeCalendar;
  };
};

export function createApp(
  config: AppConfig,
  downtime: PlannedDowntimeCalendar = EMPTY_DOWNTIME_CALENDAR
): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // CORS middleware
  app.use('/*', cors({
    origin: ['http://localhost:5173', 'http://localhost:3000'],
    credentials: true,
  }));

  // Reference data and settings for every handler
  app.use('*', async (c, next) => {
    c.set('config', config);
    c.set('downtime', downtime);
    await next();
  });

  // Health check
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      plannedDowntimeVersion: c.get('downtime').version,
    });
  });

  // API routes
  app.route('/api/schedule', scheduleRouter);
  app.route('/api/patterns', patternsRouter);
  app.route('/api/exceptions', exceptionsRouter);
  app.route('/api/rotation', rotationRouter);

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  // Error handler
  app.onError((err, c) => {
    console.error('Error:', err);
    return c.json({ error: 'Internal server error', message: err.message }, 500);
  });

  return app;
}
