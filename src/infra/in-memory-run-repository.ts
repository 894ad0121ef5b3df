import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import {
  asComponentRunId,
  asStudyRunId,
  type BatchId,
  type ComponentRunId,
  type StudyRunId,
  type WorkerId,
} from '../domain/ids.js';
import type { ComponentRun, NewComponentRun, NewStudyRun, StudyRun } from '../domain/runs.js';
import type { RunRepositoryError, RunRepositoryPort } from '../ports/run-repository.port.js';

/**
 * Process-local run repository.
 *
 * Records live in insertion-ordered maps, so list operations return them in
 * creation order. Ids count up from 1. `saveStudyRun` compares versions
 * before writing; nothing here is shared across processes.
 */
export class InMemoryRunRepository implements RunRepositoryPort {
  private readonly studyRuns = new Map<StudyRunId, StudyRun>();
  private readonly componentRuns = new Map<ComponentRunId, ComponentRun>();
  private nextStudyRunId = 1;
  private nextComponentRunId = 1;

  createStudyRun(draft: NewStudyRun): ResultAsync<StudyRun, RunRepositoryError> {
    const run: StudyRun = { ...draft, id: asStudyRunId(this.nextStudyRunId++), version: 0 };
    this.studyRuns.set(run.id, run);
    return okAsync(run);
  }

  loadStudyRun(id: StudyRunId): ResultAsync<StudyRun | null, RunRepositoryError> {
    return okAsync(this.studyRuns.get(id) ?? null);
  }

  saveStudyRun(run: StudyRun): ResultAsync<StudyRun, RunRepositoryError> {
    const stored = this.studyRuns.get(run.id);
    if (!stored) {
      return errAsync({
        code: 'RECORD_NOT_FOUND',
        message: `Study run ${run.id} doesn't exist`,
        entity: 'StudyRun',
        id: run.id,
      });
    }
    if (stored.version !== run.version) {
      return errAsync({
        code: 'STALE_WRITE',
        message: `Study run ${run.id} was saved concurrently (expected version ${run.version}, found ${stored.version})`,
        studyRunId: run.id,
        expectedVersion: run.version,
        actualVersion: stored.version,
      });
    }
    const next: StudyRun = { ...run, version: stored.version + 1 };
    this.studyRuns.set(run.id, next);
    return okAsync(next);
  }

  listStudyRunsOfWorker(workerId: WorkerId): ResultAsync<readonly StudyRun[], RunRepositoryError> {
    return okAsync([...this.studyRuns.values()].filter((r) => r.workerId === workerId));
  }

  listWorkerIdsOfBatch(batchId: BatchId): ResultAsync<ReadonlySet<WorkerId>, RunRepositoryError> {
    const ids = new Set<WorkerId>();
    for (const run of this.studyRuns.values()) {
      if (run.batchId === batchId) ids.add(run.workerId);
    }
    return okAsync(ids);
  }

  createComponentRun(draft: NewComponentRun): ResultAsync<ComponentRun, RunRepositoryError> {
    if (!this.studyRuns.has(draft.studyRunId)) {
      return errAsync({
        code: 'RECORD_NOT_FOUND',
        message: `Study run ${draft.studyRunId} doesn't exist`,
        entity: 'StudyRun',
        id: draft.studyRunId,
      });
    }
    const run: ComponentRun = { ...draft, id: asComponentRunId(this.nextComponentRunId++) };
    this.componentRuns.set(run.id, run);
    return okAsync(run);
  }

  removeComponentRun(id: ComponentRunId): ResultAsync<void, RunRepositoryError> {
    if (!this.componentRuns.delete(id)) return errAsync(componentRunNotFound(id));
    return okAsync(undefined);
  }

  saveComponentRun(run: ComponentRun): ResultAsync<ComponentRun, RunRepositoryError> {
    if (!this.componentRuns.has(run.id)) return errAsync(componentRunNotFound(run.id));
    this.componentRuns.set(run.id, run);
    return okAsync(run);
  }

  listComponentRuns(studyRunId: StudyRunId): ResultAsync<readonly ComponentRun[], RunRepositoryError> {
    return okAsync([...this.componentRuns.values()].filter((c) => c.studyRunId === studyRunId));
  }
}

function componentRunNotFound(id: ComponentRunId): RunRepositoryError {
  return { code: 'RECORD_NOT_FOUND', message: `Component run ${id} doesn't exist`, entity: 'ComponentRun', id };
}
