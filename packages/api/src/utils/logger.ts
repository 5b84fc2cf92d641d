import pino from 'pino';

export const logger = pino({
  name: 'ragline-api',
  level: process.env.LOG_LEVEL || 'info',
  base: { service: 'ragline-api' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;
