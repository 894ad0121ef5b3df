import type { ResultAsync } from 'neverthrow';
import { authorizationGateFor } from '../authorization/gates.js';
import type { BatchId, StudyId, WorkerId } from '../domain/ids.js';
import type { ComponentRun, StudyRun } from '../domain/runs.js';
import type { Batch, Component, Study } from '../domain/study.js';
import { firstActiveComponent } from '../lifecycle/run-queries.js';
import type { RequestContext } from '../session-token/request-context.js';
import type { SessionToken } from '../session-token/session-token.js';
import type { UseCaseError } from './errors.js';
import { loadStudy } from './run-scope.js';
import { fail, runUseCase, unwrap, unwrapSync, type UseCaseDeps } from './use-case-deps.js';

export interface StartStudyRunInput {
  readonly studyId: StudyId;
  /** null: the study's default batch */
  readonly batchId: BatchId | null;
  readonly workerId: WorkerId;
  readonly assignmentId: string | null;
}

export interface StartedStudyRun {
  readonly study: Study;
  readonly batch: Batch;
  readonly studyRun: StudyRun;
  readonly component: Component;
  readonly componentRun: ComponentRun;
  readonly token: SessionToken;
}

/**
 * Starts a new run of a study for a worker and hands the browser its session token.
 *
 * Earlier runs of the same worker on this study that are still going are
 * abandoned first and their tokens dropped. A browser already holding the
 * maximum number of tokens is turned away before anything is created.
 */
export function createStartStudyRun(deps: UseCaseDeps) {
  return (ctx: RequestContext, input: StartStudyRunInput): ResultAsync<StartedStudyRun, UseCaseError> =>
    runUseCase(async () => {
      const study = await loadStudy(deps, input.studyId);

      const batchLookup =
        input.batchId === null ? deps.catalog.findDefaultBatch(study.id) : deps.catalog.findBatch(input.batchId);
      const batch =
        (await unwrap(batchLookup)) ??
        fail({
          code: 'BATCH_NOT_FOUND',
          message:
            input.batchId === null
              ? `Study ${study.id} has no default batch`
              : `Batch ${input.batchId} doesn't exist`,
          studyId: study.id,
          batchId: input.batchId,
        });

      const worker =
        (await unwrap(deps.workers.findWorker(input.workerId))) ??
        fail({ code: 'WORKER_NOT_FOUND', message: `Worker ${input.workerId} doesn't exist`, workerId: input.workerId });

      const workerRuns = await unwrap(deps.repo.listStudyRunsOfWorker(worker.id));
      const batchWorkerIds = await unwrap(deps.repo.listWorkerIdsOfBatch(batch.id));
      unwrapSync(
        authorizationGateFor(worker.kind).canStart({
          worker,
          study,
          batch,
          workerRuns,
          batchWorkerIds,
          hints: { assignmentId: input.assignmentId },
        })
      );

      const component = unwrapSync(firstActiveComponent(study));

      const abandoned = await unwrap(deps.lifecycle.abandonStaleRuns(worker, study));
      for (const run of abandoned) deps.tokens.discard(ctx, run.id);

      const slot = unwrapSync(deps.tokens.currentSet(ctx).nextFreeSlot());

      const now = deps.clock.nowMs();
      const studyRun = await unwrap(
        deps.repo.createStudyRun({
          studyId: study.id,
          batchId: batch.id,
          workerId: worker.id,
          state: 'STARTED',
          confirmationCode: null,
          errorMessage: null,
          startTime: now,
          endTime: null,
        })
      );
      const componentRun = await unwrap(deps.lifecycle.startComponent(study, component, studyRun));

      const token = unwrapSync(
        deps.tokens.write(ctx, {
          slot,
          workerId: worker.id,
          workerKind: worker.kind,
          batchId: batch.id,
          studyId: study.id,
          studyRunId: studyRun.id,
          componentId: component.id,
          componentRunId: componentRun.id,
          componentPosition: componentRun.position,
          groupRunId: null,
          creationTime: now,
        })
      );

      deps.logger.info(
        { studyRunId: studyRun.id, studyId: study.id, batchId: batch.id, workerId: worker.id, slot },
        'Study run started'
      );
      return { study, batch, studyRun, component, componentRun, token };
    });
}
