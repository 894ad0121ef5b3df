export { RunLifecycle, ABANDONED_RUN_MESSAGE } from './run-lifecycle.js';
export { RunQueries, selectComponentRun, firstActiveComponent, activeComponentAfter, findComponentOfStudy } from './run-queries.js';
export { generateConfirmationCode } from './confirmation-code.js';
export type { RunLifecycleError, RunQueryError } from './errors.js';
