import pino from 'pino';
import { LoggerInterface } from 'workflow-debug-proxy';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * JSON-lines logger on stderr.
 */
export function createLogger(options: { level: LogLevel; name?: string }): LoggerInterface {
  return pino(
    {
      name: options.name ?? 'debug-proxy',
      level: options.level,
    },
    pino.destination(2),
  );
}
