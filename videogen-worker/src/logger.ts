import pino from 'pino';

export const logger = pino({
  name: 'videogen-worker',
  level: process.env.LOG_LEVEL ?? 'info'
});
