#!/usr/bin/env node
import { Client, Connection } from '@temporalio/client';
import { createCli, type StartRequest } from './cli.js';
import { loadEnvFiles, loadStarterConfig } from './config.js';
import { logger } from './logger.js';
import { TemporalWorkflowSubmitter, VideoGenerationStarter, settleStart, type StartResult } from './starter.js';
import { initTelegram, sendCompletionNotification, sendErrorNotification } from './telegram.js';

async function submit(request: StartRequest): Promise<StartResult> {
  const config = loadStarterConfig();
  logger.level = config.LOG_LEVEL;
  initTelegram(config);

  const connection = await Connection.connect({ address: config.TEMPORAL_ADDRESS });
  try {
    const client = new Client({ connection, namespace: config.TEMPORAL_NAMESPACE });
    const starter = new VideoGenerationStarter(new TemporalWorkflowSubmitter(client, config), {
      completed: (workflowId, output) => sendCompletionNotification(workflowId, output.gcsUri, output.clipCount),
      failed: (workflowId, error) => sendErrorNotification(workflowId, error)
    });
    return await starter.start(request.input, request.workflowId, request.wait);
  } finally {
    await connection.close();
  }
}

const cli = createCli(async (request) => {
  const result = await settleStart(request.workflowId, () => submit(request));
  process.stdout.write(`${JSON.stringify(result)}\n`);
  if (!result.success) {
    process.exitCode = 1;
  }
});

async function main(): Promise<void> {
  const envPath = loadEnvFiles();
  logger.debug({ envPath }, envPath ? 'Loaded .env' : 'Could not load .env');

  cli.parse(process.argv, { run: false });
  await cli.runMatchedCommand();
}

main().catch((error) => {
  logger.fatal({ error }, 'Fatal error in starter');
  process.exit(1);
});
