import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import { stdTimeFunctions } from 'pino';

export type { Logger };

export const createLoggerOptions = (level: string): LoggerOptions => ({
  level,
  name: 'gridlake-ingest',
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export function createLogger(level: string): Logger {
  return pino(createLoggerOptions(level));
}

/** Logger for tests and callers that do not care about output. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
