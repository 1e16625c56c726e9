import pino from 'pino';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

export const logger = pino({
  name: 'velvetqueue',
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : 'info'),
  timestamp: pino.stdTimeFunctions.isoTime
});

export type Logger = typeof logger;

export const createScopedLogger = (scope: string): Logger => logger.child({ scope });
