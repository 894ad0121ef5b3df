export type { AuthorizationGate, ContinueInput, StartHints, StartInput } from './authorization-gate.js';
export type { AuthorizationError } from './errors.js';
export { AUTHORIZATION_GATES, authorizationGateFor } from './gates.js';
export { MTURK_PREVIEW_ASSIGNMENT_ID } from './batch-policy.js';
