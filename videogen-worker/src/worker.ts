import { fileURLToPath } from 'node:url';
import { GoogleGenAI } from '@google/genai';
import { NativeConnection, Runtime, Worker } from '@temporalio/worker';
import { createActivities, type VideoGenerationActivities } from './activities/index.js';
import { GeminiSceneWriter } from './clients/gemini.js';
import { VeoVideoModel } from './clients/veo.js';
import { loadRuntimeConfig, type RuntimeConfig } from './config.js';
import { logger } from './logger.js';
import { createFFmpegRunner, VideoEditor } from './media/ffmpeg.js';
import { GoogleCloudStorage } from './storage/gcs.js';
import { PinoTemporalLogger } from './temporalLogger.js';

export interface WorkerHandle {
  worker: Worker;
  connection: NativeConnection;
  config: RuntimeConfig;
}

export function buildActivities(config: RuntimeConfig): VideoGenerationActivities {
  const genai = new GoogleGenAI({ apiKey: config.GOOGLE_API_KEY });

  return createActivities({
    sceneWriter: new GeminiSceneWriter(genai, config.GEMINI_MODEL),
    videoModel: new VeoVideoModel(genai, {
      modelName: config.VEO_MODEL,
      pollIntervalMs: config.VEO_POLL_INTERVAL_SECONDS * 1000,
      timeoutMs: config.VEO_TIMEOUT_MINUTES * 60 * 1000
    }),
    storage: new GoogleCloudStorage(config.GCS_BUCKET_NAME),
    editor: new VideoEditor(createFFmpegRunner(config.FFMPEG_PATH))
  });
}

/**
 * Validates configuration, then connects to Temporal and registers the workflow
 * and activities. Nothing is contacted when the configuration is invalid.
 */
export async function startWorker(env: NodeJS.ProcessEnv = process.env): Promise<WorkerHandle> {
  const config = loadRuntimeConfig(env);
  logger.level = config.LOG_LEVEL;

  // signals are handled by the entry point so the connection closes after shutdown
  Runtime.install({ logger: new PinoTemporalLogger(logger), shutdownSignals: [] });

  const connection = await NativeConnection.connect({ address: config.TEMPORAL_ADDRESS });
  const worker = await Worker.create({
    connection,
    namespace: config.TEMPORAL_NAMESPACE,
    taskQueue: config.TEMPORAL_TASK_QUEUE,
    workflowsPath: fileURLToPath(new URL('./workflows', import.meta.url)),
    activities: buildActivities(config),
    maxConcurrentActivityTaskExecutions: config.MAX_CONCURRENT_ACTIVITIES
  });

  logger.info(
    {
      address: config.TEMPORAL_ADDRESS,
      namespace: config.TEMPORAL_NAMESPACE,
      taskQueue: config.TEMPORAL_TASK_QUEUE,
      maxConcurrentActivities: config.MAX_CONCURRENT_ACTIVITIES
    },
    'Worker created'
  );

  return { worker, connection, config };
}

/**
 * Starts a graceful shutdown on the first signal. Later signals are logged and
 * ignored while the worker drains. Returns a function that removes the handlers.
 */
export function shutdownOnSignals(
  worker: Pick<Worker, 'shutdown'>,
  signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']
): () => void {
  let shuttingDown = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      logger.warn({ signal }, 'Shutdown already in progress');
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down worker');
    worker.shutdown();
  };

  for (const signal of signals) {
    process.on(signal, onSignal);
  }
  return () => {
    for (const signal of signals) {
      process.off(signal, onSignal);
    }
  };
}
