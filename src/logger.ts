// Root logger (pino). Components take child loggers from here.
import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export function loggerOptions(
  level = process.env.LOG_LEVEL || (process.env.VITEST ? 'silent' : 'info'),
): LoggerOptions {
  const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test' && !process.env.VITEST;
  return {
    level,
    ...(pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : {}),
  };
}

export const logger: Logger = pino(loggerOptions());

export type { Logger };
