import type { Brand } from '../runtime/brand.js';

/**
 * Process-level errors (startup, configuration).
 *
 * Request-level failures live with the module that raises them
 * (session-token, lifecycle, authorization, usecases); these are the ones the
 * entrypoint prints before giving up.
 */

export type ConfigIssue = Readonly<{
  readonly path: string;
  readonly message: string;
}>;

export type ConfigInvalidError = Readonly<{
  readonly _tag: 'ConfigInvalid';
  readonly source: string;
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}>;

export type StartupFailedError = Readonly<{
  readonly _tag: 'StartupFailed';
  readonly phase: string;
  readonly message: string;
  readonly cause?: unknown;
}>;

export type UnexpectedError = Readonly<{
  readonly _tag: 'Unexpected';
  readonly message: string;
  readonly cause: unknown;
}>;

export type AppError = ConfigInvalidError | StartupFailedError | UnexpectedError;

/**
 * Validated config marker; only `loadConfig` (and test helpers) mint it.
 */
export type ValidatedAppConfig<T> = Brand<T, 'ValidatedAppConfig'>;
