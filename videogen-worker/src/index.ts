#!/usr/bin/env node
import { loadEnvFiles } from './config.js';
import { logger } from './logger.js';
import { shutdownOnSignals, startWorker } from './worker.js';

async function main(): Promise<void> {
  const envPath = loadEnvFiles();
  if (envPath) {
    logger.info({ envPath }, 'Loaded .env');
  } else {
    logger.warn('Could not load .env, using process environment only');
  }

  const { worker, connection, config } = await startWorker();

  shutdownOnSignals(worker);

  logger.info({ taskQueue: config.TEMPORAL_TASK_QUEUE }, 'Starting video generation worker');
  try {
    await worker.run();
  } finally {
    await connection.close();
  }
  logger.info('Worker shutdown complete');
}

main().catch((error) => {
  logger.fatal({ error }, 'Fatal error in worker');
  process.exit(1);
});
