import type { Result, ResultAsync } from 'neverthrow';
import { err, errAsync, ok, okAsync } from 'neverthrow';
import type { ComponentId, StudyRunId } from '../domain/ids.js';
import type { ComponentRun, StudyRun } from '../domain/runs.js';
import { isComponentRunTerminal } from '../domain/runs.js';
import type { Component, Study } from '../domain/study.js';
import type { Worker } from '../domain/worker.js';
import type { RunRepositoryError, RunRepositoryPort } from '../ports/run-repository.port.js';
import type { RunQueryError } from './errors.js';

/**
 * The non-terminal run of the component if there is one, else its most recent run.
 * At most one component run per study run is non-terminal, so the first match is the one.
 */
export function selectComponentRun(componentRuns: readonly ComponentRun[], componentId: ComponentId): ComponentRun | null {
  const ofComponent = componentRuns.filter((c) => c.componentId === componentId);
  return ofComponent.find((c) => !isComponentRunTerminal(c)) ?? ofComponent[ofComponent.length - 1] ?? null;
}

export function firstActiveComponent(study: Study): Result<Component, RunQueryError> {
  const first = study.components.find((c) => c.active);
  if (!first) {
    return err({
      code: 'STUDY_HAS_NO_ACTIVE_COMPONENTS',
      message: `Study ${study.id} has no active components`,
      studyId: study.id,
    });
  }
  return ok(first);
}

/**
 * First active component after `componentId` in study order; null at the end of the study.
 * A null `componentId` means nothing has started yet.
 */
export function activeComponentAfter(study: Study, componentId: ComponentId | null): Component | null {
  const from = componentId === null ? 0 : study.components.findIndex((c) => c.id === componentId) + 1;
  if (componentId !== null && from === 0) return null;
  return study.components.slice(from).find((c) => c.active) ?? null;
}

export function findComponentOfStudy(study: Study, componentId: ComponentId): Result<Component, RunQueryError> {
  const component = study.components.find((c) => c.id === componentId);
  if (!component) {
    return err({
      code: 'COMPONENT_NOT_FOUND',
      message: `Study ${study.id} has no component ${componentId}`,
      studyId: study.id,
      componentId,
    });
  }
  if (!component.active) {
    return err({
      code: 'COMPONENT_NOT_ACTIVE',
      message: `Component ${componentId} of study ${study.id} is not active`,
      studyId: study.id,
      componentId,
    });
  }
  return ok(component);
}

/**
 * Read-only lookups over a worker's runs. No state changes.
 */
export class RunQueries {
  constructor(private readonly repo: RunRepositoryPort) {}

  /**
   * The worker's run of the study still in STARTED.
   * At most one exists (older ones are abandoned when a new run starts).
   */
  findStartedStudyRun(worker: Worker, study: Study): ResultAsync<StudyRun, RunQueryError> {
    return this.runsOfWorkerOnStudy(worker, study).andThen((runs) => {
      const started = runs.find((r) => r.state === 'STARTED');
      if (started) return okAsync(started);
      return errAsync({
        code: 'WORKER_NEVER_STARTED_STUDY',
        message: `Worker ${worker.id} never started study ${study.id}`,
        workerId: worker.id,
        studyId: study.id,
      } as const);
    });
  }

  /** The worker's most recent run of the study, whatever its state. */
  findLastStudyRun(worker: Worker, study: Study): ResultAsync<StudyRun, RunQueryError> {
    return this.runsOfWorkerOnStudy(worker, study).andThen((runs) => {
      const last = runs[runs.length - 1];
      if (last) return okAsync(last);
      return errAsync({
        code: 'WORKER_NEVER_DID_STUDY',
        message: `Worker ${worker.id} never did study ${study.id}`,
        workerId: worker.id,
        studyId: study.id,
      } as const);
    });
  }

  findStudyRunOfWorker(worker: Worker, study: Study, studyRunId: StudyRunId): ResultAsync<StudyRun, RunQueryError> {
    return this.repo.loadStudyRun(studyRunId).andThen((run) => {
      if (!run) {
        return errAsync({
          code: 'STUDY_RUN_NOT_FOUND',
          message: `Study run ${studyRunId} doesn't exist`,
          studyRunId,
        } as const);
      }
      if (run.workerId !== worker.id || run.studyId !== study.id) {
        return errAsync({
          code: 'STUDY_RUN_NOT_OWNED',
          message: `Study run ${studyRunId} doesn't belong to worker ${worker.id} and study ${study.id}`,
          studyRunId,
          workerId: worker.id,
          studyId: study.id,
        } as const);
      }
      return okAsync(run);
    });
  }

  findComponentRun(component: Component, run: StudyRun): ResultAsync<ComponentRun | null, RunRepositoryError> {
    return this.repo.listComponentRuns(run.id).map((componentRuns) => selectComponentRun(componentRuns, component.id));
  }

  /** Next active component after the one most recently started in the run. */
  nextActiveComponent(study: Study, run: StudyRun): ResultAsync<Component | null, RunRepositoryError> {
    return this.repo.listComponentRuns(run.id).map((componentRuns) => {
      const last = componentRuns[componentRuns.length - 1];
      return activeComponentAfter(study, last ? last.componentId : null);
    });
  }

  private runsOfWorkerOnStudy(worker: Worker, study: Study): ResultAsync<readonly StudyRun[], RunRepositoryError> {
    return this.repo.listStudyRunsOfWorker(worker.id).map((runs) => runs.filter((r) => r.studyId === study.id));
  }
}
