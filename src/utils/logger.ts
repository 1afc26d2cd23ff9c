import pino, { Logger } from 'pino';
import { LogLevel } from '../types.js';

function resolveLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.trim().toLowerCase();
  switch (fromEnv) {
    case 'trace':
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'fatal':
      return fromEnv;
    default:
      return 'info';
  }
}

export const logger: Logger = pino({
  name: 'allpair',
  level: resolveLevel(),
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime
});

export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export type { Logger };
