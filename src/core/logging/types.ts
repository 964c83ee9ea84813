import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, used directly.
 *
 * API follows pino idiom (data-first):
 *   logger.warn({ registry: 3 }, 'Already configured as global');
 *   logger.error({ err: error }, 'Bootstrap failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
