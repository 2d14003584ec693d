import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'crm-query-mock',
    level: options.level ?? 'info',
  });
}

/** Logger for library callers that do not pass one. */
export const silentLogger: Logger = pino({ level: 'silent' });
