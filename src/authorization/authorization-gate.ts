import type { Result } from 'neverthrow';
import type { WorkerId } from '../domain/ids.js';
import type { StudyRun } from '../domain/runs.js';
import type { Batch, Study } from '../domain/study.js';
import type { Worker, WorkerKind } from '../domain/worker.js';
import type { AuthorizationError } from './errors.js';

/** What the gate needs to decide whether a worker may keep going. */
export interface ContinueInput {
  readonly worker: Worker;
  readonly study: Study;
  readonly batch: Batch;
  /** All of the worker's runs, oldest first */
  readonly workerRuns: readonly StudyRun[];
}

export interface StartHints {
  /** MTurk's assignment id; a fixed placeholder while the HIT is only previewed */
  readonly assignmentId: string | null;
}

export interface StartInput extends ContinueInput {
  /** Workers that already have a run in the batch */
  readonly batchWorkerIds: ReadonlySet<WorkerId>;
  readonly hints: StartHints;
}

/**
 * Per-worker-kind authorization.
 *
 * One gate per kind; the set is closed (see AUTHORIZATION_GATES). A refusal
 * carries the reason the client is shown. Gates are pure: callers load the
 * runs and batch membership they need.
 */
export interface AuthorizationGate<K extends WorkerKind = WorkerKind> {
  readonly kind: K;

  /** May the worker start a new run of the study in this batch? */
  canStart(input: StartInput): Result<void, AuthorizationError>;

  /** May the worker continue its run of the study in this batch? */
  canContinue(input: ContinueInput): Result<void, AuthorizationError>;
}
