import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type is pino's own; no wrapper.
 *
 * Data-first calls:
 *   logger.info({ studyRunId: 7 }, 'Study run started');
 *   logger.warn({ err: error }, 'Discarded malformed session token');
 */
export type Logger = PinoLogger;

export interface ILoggerFactory {
  /** Child logger bound to `{ component }` */
  create(component: string): Logger;

  readonly root: Logger;
}

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
