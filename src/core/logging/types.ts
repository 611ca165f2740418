import type { Logger as PinoLogger } from 'pino';

/**
 * Logger is pino's own type; no wrapper.
 *
 * Data-first, pino idiom:
 *   logger.info({ pierId }, 'pier staged');
 *   logger.error({ err }, 'launch failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Child logger tagged with `component` */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
