import type { Logger } from './types.js';
import { createRootLogger, resolveLogLevel } from './create-logger.js';

/**
 * Logger for code that runs BEFORE the DI container exists (config loading, entrypoint).
 * After DI is ready, use the injected ILoggerFactory instead.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = createRootLogger(resolveLogLevel(process.env['STUDY_RUNS_LOG_LEVEL']));
  }
  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
