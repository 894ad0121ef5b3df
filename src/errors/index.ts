export type {
  AppError,
  ConfigIssue,
  ConfigInvalidError,
  StartupFailedError,
  UnexpectedError,
  ValidatedAppConfig,
} from './app-error.js';
export { Err } from './factories.js';
export { formatAppError, describeCause } from './formatter.js';
