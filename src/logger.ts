import { pino } from 'pino';

/**
 * The subset of a pino logger the library writes to. Any pino instance (or a
 * child of a host application's logger) satisfies it.
 */
export interface SearchLogger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

export const LOG_LEVEL_ENV = 'FACET_SEARCH_LOG_LEVEL';

export function createLogger(level?: string): SearchLogger {
  return pino({
    name: 'facet-search',
    level: level ?? process.env[LOG_LEVEL_ENV] ?? 'info',
  });
}
