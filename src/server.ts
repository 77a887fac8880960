#!/usr/bin/env node
import 'dotenv/config';
import { serve } from '@hono/node-server';
import { loadConfigFromEnv } from './config';
import { createShutdownHandler } from './shutdown';
import handler from './index';
import { MongoNoteStore } from './store';
import type { Env } from './types';

async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const store = await MongoNoteStore.connect(config.mongoUri);
  const env: Env = { NOTES_STORE: store };

  const server = serve(
    {
      fetch: (request: Request) => handler.fetch(request, env),
      port: config.port,
      hostname: config.host,
    },
    (info) => {
      console.log(`notes listening on http://${config.host}:${info.port}`);
    }
  );

  const shutdown = createShutdownHandler({ server, store });

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('Failed to start notes:', err);
  process.exit(1);
});
