import pino, { type Logger } from 'pino';
import type { LogLevel } from './config.js';

export type { Logger };

export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({
    name: 'user-directory',
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** Logger for tests and tools that should stay quiet. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
