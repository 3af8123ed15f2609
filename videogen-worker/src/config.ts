import { config as loadEnv } from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { GENERATION_HEARTBEAT_TIMEOUT_SECONDS, MAX_POLL_INTERVAL_SECONDS } from './workflows/plan.js';

// .env usually sits at the repository root, one level above the package
const envPaths = [
  resolve(process.cwd(), '../.env'),
  resolve(process.cwd(), '../../.env'),
  resolve(process.cwd(), '.env')
];

export function loadEnvFiles(): string | null {
  for (const envPath of envPaths) {
    const result = loadEnv({ path: envPath });
    if (!result.error) {
      return envPath;
    }
  }
  return null;
}

const schema = z.object({
  GOOGLE_API_KEY: z.string().min(1, 'GOOGLE_API_KEY is required'),
  GCS_BUCKET_NAME: z.string().min(1, 'GCS_BUCKET_NAME is required'),
  TEMPORAL_ADDRESS: z.string().min(1).default('localhost:7233'),
  TEMPORAL_NAMESPACE: z.string().min(1).default('default'),
  TEMPORAL_TASK_QUEUE: z.string().min(1).default('video-gen-task-queue'),
  GEMINI_MODEL: z.string().min(1).default('gemini-2.5-flash'),
  VEO_MODEL: z.string().min(1).default('veo-2.0-generate-001'),
  VEO_POLL_INTERVAL_SECONDS: z.coerce
    .number()
    .positive()
    .max(
      MAX_POLL_INTERVAL_SECONDS,
      `Poll interval must be at most ${MAX_POLL_INTERVAL_SECONDS}s to heartbeat within the ${GENERATION_HEARTBEAT_TIMEOUT_SECONDS}s timeout`
    )
    .default(10),
  VEO_TIMEOUT_MINUTES: z.coerce.number().positive().default(10),
  FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
  MAX_CONCURRENT_ACTIVITIES: z.coerce.number().int().min(1).default(5),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info')
});

export type RuntimeConfig = z.infer<typeof schema>;

/**
 * Validates worker settings from the environment. Throws a {@link ConfigError}
 * naming every invalid field, so the worker stops before it connects to Temporal.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const result = schema.safeParse({
    GOOGLE_API_KEY: env.GOOGLE_API_KEY || env.GEMINI_API_KEY,
    GCS_BUCKET_NAME: env.GCS_BUCKET_NAME,
    TEMPORAL_ADDRESS: env.TEMPORAL_ADDRESS,
    TEMPORAL_NAMESPACE: env.TEMPORAL_NAMESPACE,
    TEMPORAL_TASK_QUEUE: env.TEMPORAL_TASK_QUEUE,
    GEMINI_MODEL: env.GEMINI_MODEL,
    VEO_MODEL: env.VEO_MODEL,
    VEO_POLL_INTERVAL_SECONDS: env.VEO_POLL_INTERVAL_SECONDS,
    VEO_TIMEOUT_MINUTES: env.VEO_TIMEOUT_MINUTES,
    FFMPEG_PATH: env.FFMPEG_PATH,
    MAX_CONCURRENT_ACTIVITIES: env.MAX_CONCURRENT_ACTIVITIES,
    LOG_LEVEL: env.LOG_LEVEL
  });

  if (!result.success) {
    throw new ConfigError(result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }

  return result.data;
}
