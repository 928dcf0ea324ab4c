import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, unwrapped.
 *
 * API follows pino idiom (data-first):
 *   logger.debug({ capacity: 4 }, 'collection created');
 *   logger.warn({ err: error }, 'append rejected');
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

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
