import type { AppError, ConfigIssue, ConfigInvalidError, StartupFailedError, UnexpectedError } from './app-error.js';

export const Err = {
  configInvalid: (source: string, issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    source,
    issues,
    message: `Invalid configuration in ${source}`,
  }),

  startupFailed: (phase: string, message: string, cause?: unknown): StartupFailedError => ({
    _tag: 'StartupFailed',
    phase,
    message,
    cause,
  }),

  unexpected: (message: string, cause: unknown): UnexpectedError => ({
    _tag: 'Unexpected',
    message,
    cause,
  }),
} as const satisfies Record<string, (...args: never[]) => AppError>;
