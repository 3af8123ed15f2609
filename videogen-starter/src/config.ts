import { config as loadEnv } from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';

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

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Configuration validation failed: ${issues.join(', ')}`);
    this.name = 'ConfigError';
  }
}

const schema = z
  .object({
    TEMPORAL_ADDRESS: z.string().min(1).default('localhost:7233'),
    TEMPORAL_NAMESPACE: z.string().min(1).default('default'),
    TEMPORAL_TASK_QUEUE: z.string().min(1).default('video-gen-task-queue'),
    WORKFLOW_TIMEOUT_MINUTES: z.coerce.number().positive().default(60),
    TELEGRAM_BOT_TOKEN: z.string().optional(),
    TELEGRAM_CHAT_ID: z.string().optional(),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info')
  })
  .refine((value) => Boolean(value.TELEGRAM_BOT_TOKEN) === Boolean(value.TELEGRAM_CHAT_ID), {
    message: 'TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set together',
    path: ['TELEGRAM_CHAT_ID']
  });

export type StarterConfig = z.infer<typeof schema>;

export function loadStarterConfig(env: NodeJS.ProcessEnv = process.env): StarterConfig {
  const result = schema.safeParse({
    TEMPORAL_ADDRESS: env.TEMPORAL_ADDRESS,
    TEMPORAL_NAMESPACE: env.TEMPORAL_NAMESPACE,
    TEMPORAL_TASK_QUEUE: env.TEMPORAL_TASK_QUEUE,
    WORKFLOW_TIMEOUT_MINUTES: env.WORKFLOW_TIMEOUT_MINUTES,
    TELEGRAM_BOT_TOKEN: env.TELEGRAM_BOT_TOKEN || undefined,
    TELEGRAM_CHAT_ID: env.TELEGRAM_CHAT_ID || undefined,
    LOG_LEVEL: env.LOG_LEVEL
  });

  if (!result.success) {
    throw new ConfigError(result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`));
  }

  return result.data;
}
