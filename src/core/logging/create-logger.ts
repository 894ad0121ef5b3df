import pino, { type DestinationStream } from 'pino';
import { inject, singleton } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { LOG_LEVELS } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * STUDY_RUNS_LOG_LEVEL: trace | debug | info | warn | error | fatal | silent
 * Default: info
 */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? 'info';
}

export function createRootLogger(level: LogLevel, destination: DestinationStream = pino.destination({ dest: 2, sync: true })): Logger {
  return pino(
    {
      level,
      redact: REDACTION_CONFIG,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    destination
  );
}

/**
 * Logger factory - one root, child logger per component.
 *
 * Injectable singleton; tests register their own factory before the container resolves this one.
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(@inject(DI.Config.App) config: ValidatedConfig) {
    this._root = createRootLogger(config.logLevel);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
