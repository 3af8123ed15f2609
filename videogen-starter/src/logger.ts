import pino from 'pino';

// stdout carries the JSON result line, so logs go to stderr
export const logger = pino(
  {
    name: 'videogen-starter',
    level: process.env.LOG_LEVEL ?? 'info'
  },
  pino.destination(2)
);
