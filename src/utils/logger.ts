/**
 * Shared pino logger
 * Pretty output for interactive runs, silent under test
 */

import { pino, type Logger } from 'pino';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : 'info'),
  ...(isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
          },
        },
      }),
});

export function createLogger(component: string): Logger {
  return logger.child({ component });
}

export type { Logger };
