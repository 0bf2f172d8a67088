import pino from 'pino';
import type { Logger } from 'pino';

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export const LOG_TARGETS = ['pino-pretty', 'pino/file'] as const;
export type LogTarget = typeof LOG_TARGETS[number];

// Library default: plain JSON records, no transport worker.
// The CLI switches to a transport through makeLogger.
export let logger: Logger = pino({
  level: process.env['LOG_LEVEL'] ?? 'info', // trace, debug, info, warn, error, fatal, silent
});

export const makeLogger = (level: LogLevel, target: LogTarget = 'pino-pretty'): void => {
  logger = pino({
    level,
    transport: target === 'pino-pretty'
      ? {
          target,
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : { target, options: { destination: 1 } },
  });
};
