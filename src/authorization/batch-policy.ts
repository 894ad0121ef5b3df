import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { StudyRun } from '../domain/runs.js';
import type { AuthorizationError } from './errors.js';
import type { ContinueInput, StartInput } from './authorization-gate.js';

/** Checks every kind shares: the batch is active, belongs to the study and admits the worker's kind. */
export function checkBatchPolicy({ worker, study, batch }: ContinueInput): Result<void, AuthorizationError> {
  if (!batch.active) {
    return err({ code: 'BATCH_INACTIVE', message: `Batch ${batch.id} is inactive`, batchId: batch.id });
  }
  if (batch.studyId !== study.id) {
    return err({
      code: 'BATCH_NOT_IN_STUDY',
      message: `Batch ${batch.id} doesn't belong to study ${study.id}`,
      batchId: batch.id,
      studyId: study.id,
    });
  }
  if (!batch.allowedWorkerKinds.includes(worker.kind)) {
    return err({
      code: 'WORKER_KIND_NOT_ALLOWED',
      message: `Batch ${batch.id} doesn't allow workers of type ${worker.kind}`,
      batchId: batch.id,
      workerKind: worker.kind,
    });
  }
  return ok(undefined);
}

/**
 * The batch is full when `maxTotalWorkers` other workers already ran in it.
 * A worker that is already counted never fills it up again.
 */
export function checkBatchQuota({ worker, batch, batchWorkerIds }: StartInput): Result<void, AuthorizationError> {
  if (batch.maxTotalWorkers === null) return ok(undefined);

  const others = batchWorkerIds.has(worker.id) ? batchWorkerIds.size - 1 : batchWorkerIds.size;
  if (others >= batch.maxTotalWorkers) {
    return err({
      code: 'BATCH_FULL',
      message: `Batch ${batch.id} reached its maximum of ${batch.maxTotalWorkers} workers`,
      batchId: batch.id,
      maxTotalWorkers: batch.maxTotalWorkers,
    });
  }
  return ok(undefined);
}

export function runsOnStudy({ study, workerRuns }: ContinueInput): readonly StudyRun[] {
  return workerRuns.filter((r) => r.studyId === study.id);
}

/** Single-session kinds run a study once. */
export function checkNeverDidStudy(input: ContinueInput): Result<void, AuthorizationError> {
  if (runsOnStudy(input).length === 0) return ok(undefined);
  return err({
    code: 'WORKER_ALREADY_DID_STUDY',
    message: `Worker ${input.worker.id} already did study ${input.study.id}`,
    workerId: input.worker.id,
    studyId: input.study.id,
  });
}

/** Single-session kinds may only continue while their one run is still going. */
export function checkSessionOpen(input: ContinueInput): Result<void, AuthorizationError> {
  const runs = runsOnStudy(input);
  const last = runs[runs.length - 1];
  if (last && last.state === 'STARTED') return ok(undefined);
  return err({
    code: 'WORKER_SESSION_ENDED',
    message: `Worker ${input.worker.id} has no running session of study ${input.study.id}`,
    workerId: input.worker.id,
    studyId: input.study.id,
  });
}

/** MTurk sends this placeholder while a HIT is only previewed. */
export const MTURK_PREVIEW_ASSIGNMENT_ID = 'ASSIGNMENT_ID_NOT_AVAILABLE';

export function checkNotPreview({ study, hints }: StartInput): Result<void, AuthorizationError> {
  if (hints.assignmentId !== MTURK_PREVIEW_ASSIGNMENT_ID) return ok(undefined);
  return err({
    code: 'PREVIEW_NOT_ALLOWED',
    message: `Study ${study.id} can't be started from an MTurk preview; accept the HIT first`,
    studyId: study.id,
  });
}
