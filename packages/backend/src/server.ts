import { serve } from '@hono/node-server';
import { loadConfig } from './config.js';
import { createApp } from './index.js';
import { loadPlannedDowntime } from './services/planned-downtime.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const downtime = await loadPlannedDowntime(config.plannedDowntimeFile);
  const app = createApp(config, downtime);

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    console.log(`Shift rotation API listening on http://localhost:${info.port}`);
  });
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
