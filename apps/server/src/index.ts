#!/usr/bin/env node

import dotenv from 'dotenv';
import { closeDb, createDb, seedSampleTasks, TaskStore } from '@quadrant/core';
import { loadConfig } from './config.js';
import { configureLogger } from './logger.js';
import { startServer } from './server.js';

dotenv.config();

const config = loadConfig();
const logger = await configureLogger(config.logLevel);

const db = createDb(config.dbPath);
const store = new TaskStore(db, { urgentWindowDays: config.urgentWindowDays });

if (config.seed) {
  const added = seedSampleTasks(store);
  if (added > 0) logger.info('Seeded {added} sample tasks', { added });
}

const running = await startServer(store, { port: config.port, host: config.host });
logger.info('Listening on {url} (database: {dbPath})', { url: running.url, dbPath: config.dbPath });

let stopping = false;
async function shutdown(signal: string): Promise<void> {
  if (stopping) return;
  stopping = true;
  logger.info('Received {signal}, shutting down', { signal });
  try {
    await running.close();
  } finally {
    closeDb(db);
  }
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      logger.error('Shutdown failed: {error}', { error: err });
      process.exitCode = 1;
    });
  });
}
