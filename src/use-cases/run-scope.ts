import type { ResultAsync } from 'neverthrow';
import { authorizationGateFor } from '../authorization/gates.js';
import type { StudyId, StudyRunId } from '../domain/ids.js';
import type { ComponentRun, StudyRun } from '../domain/runs.js';
import { isStudyRunTerminal } from '../domain/runs.js';
import type { Batch, Component, Study } from '../domain/study.js';
import type { Worker } from '../domain/worker.js';
import type { RunLifecycleError } from '../lifecycle/errors.js';
import type { RequestContext } from '../session-token/request-context.js';
import type { SessionToken } from '../session-token/session-token.js';
import { fail, unwrap, unwrapSync, type UseCaseDeps } from './use-case-deps.js';

export interface RunRequest {
  readonly studyId: StudyId;
  readonly studyRunId: StudyRunId;
}

/** Everything a request about an existing run has established. */
export interface RunScope {
  readonly token: SessionToken;
  readonly study: Study;
  readonly batch: Batch;
  readonly worker: Worker;
  readonly run: StudyRun;
}

export type RunScopeMode =
  /** The run must still be going and the worker allowed to continue */
  | 'running'
  /** A run that already ended is returned as is (finishing twice is not an error) */
  | 'finishing';

export async function loadStudy(deps: UseCaseDeps, studyId: StudyId): Promise<Study> {
  const study = await unwrap(deps.catalog.findStudy(studyId));
  return study ?? fail({ code: 'STUDY_NOT_FOUND', message: `Study ${studyId} doesn't exist`, studyId });
}

/**
 * Resolves the client's session token for the run, the records it points at,
 * and checks the worker may continue.
 */
export async function resolveRunScope(
  deps: UseCaseDeps,
  ctx: RequestContext,
  request: RunRequest,
  mode: RunScopeMode
): Promise<RunScope> {
  const { studyId, studyRunId } = request;

  const token =
    deps.tokens.find(ctx, studyRunId) ??
    fail({ code: 'NO_SESSION_TOKEN', message: `No session token for study run ${studyRunId}`, studyRunId });

  const study = await loadStudy(deps, studyId);

  const batch =
    (await unwrap(deps.catalog.findBatch(token.batchId))) ??
    fail({ code: 'BATCH_NOT_FOUND', message: `Batch ${token.batchId} doesn't exist`, studyId, batchId: token.batchId });

  const worker =
    (await unwrap(deps.workers.findWorker(token.workerId))) ??
    fail({ code: 'WORKER_NOT_FOUND', message: `Worker ${token.workerId} doesn't exist`, workerId: token.workerId });

  const run = await unwrap(deps.queries.findStudyRunOfWorker(worker, study, studyRunId));

  if (mode === 'finishing' && isStudyRunTerminal(run)) {
    return { token, study, batch, worker, run };
  }

  const workerRuns = await unwrap(deps.repo.listStudyRunsOfWorker(worker.id));
  unwrapSync(authorizationGateFor(worker.kind).canContinue({ worker, study, batch, workerRuns }));

  if (isStudyRunTerminal(run)) {
    fail({
      code: 'STUDY_RUN_ALREADY_DONE',
      message: `Study run ${run.id} is already ${run.state}`,
      studyRunId: run.id,
      state: run.state,
    });
  }

  return { token, study, batch, worker, run };
}

/** Rewrites the run's token so it points at the component run the client is on. */
export function writeComponentToken(
  deps: UseCaseDeps,
  ctx: RequestContext,
  scope: Pick<RunScope, 'token'>,
  component: Component,
  componentRun: ComponentRun
): SessionToken {
  return unwrapSync(
    deps.tokens.write(ctx, {
      ...scope.token,
      componentId: component.id,
      componentRunId: componentRun.id,
      componentPosition: componentRun.position,
      creationTime: deps.clock.nowMs(),
    })
  );
}

/**
 * Like `unwrap`, but a forbidden reload (which has already failed the whole
 * run) also drops the browser's token for the run.
 */
export async function unwrapComponentStep<T>(
  deps: UseCaseDeps,
  ctx: RequestContext,
  run: StudyRun,
  step: ResultAsync<T, RunLifecycleError>
): Promise<T> {
  return step.match(
    (v) => v,
    (e) => {
      if (e.code === 'COMPONENT_RELOAD_FORBIDDEN') deps.tokens.discard(ctx, run.id);
      return fail(e);
    }
  );
}
