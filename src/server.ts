import { serve } from '@hono/node-server';
import app from './index';
import { loadConfig } from './config';
import { openDatabase } from './db/schema';
import type { Env } from './types';

function main(): void {
  const config = loadConfig();
  const db = openDatabase(config.databasePath);

  const env: Env = {
    DB: db,
    LOCAL_TZ: config.timeZone,
    ENVIRONMENT: config.environment,
    ANTHROPIC_API_KEY: config.anthropicApiKey,
    ANTHROPIC_MODEL: config.anthropicModel,
  };

  const server = serve({ fetch: (request) => app.fetch(request, env), port: config.port }, (info) => {
    console.log(`[Server] Listening on http://localhost:${info.port} (${config.environment}, ${config.timeZone})`);
    console.log(`[Server] Content provider: ${config.anthropicApiKey ? 'anthropic' : 'stub'}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close(() => {
      db.close();
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (err) {
  console.error('[Server] Failed to start:', err instanceof Error ? err.message : err);
  process.exit(1);
}
