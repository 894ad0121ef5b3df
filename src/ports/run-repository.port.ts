import type { ResultAsync } from 'neverthrow';
import type { BatchId, ComponentRunId, StudyRunId, WorkerId } from '../domain/ids.js';
import type { ComponentRun, NewComponentRun, NewStudyRun, StudyRun } from '../domain/runs.js';

export type RunRepositoryError =
  | { readonly code: 'REPOSITORY_FAILURE'; readonly message: string; readonly cause?: unknown }
  | { readonly code: 'RECORD_NOT_FOUND'; readonly message: string; readonly entity: 'StudyRun' | 'ComponentRun'; readonly id: number }
  | {
      readonly code: 'STALE_WRITE';
      readonly message: string;
      readonly studyRunId: StudyRunId;
      readonly expectedVersion: number;
      readonly actualVersion: number;
    };

/**
 * Durable store for study runs and component runs.
 *
 * Guarantees expected from adapters:
 * - read-your-writes within one request
 * - `saveStudyRun` is compare-and-set on `version`: a save carrying a stale
 *   version fails with STALE_WRITE and leaves the stored record untouched
 *   (first writer wins)
 * - list operations return records in creation order
 *
 * Errors are never masked by callers; they end the current request.
 */
export interface RunRepositoryPort {
  createStudyRun(draft: NewStudyRun): ResultAsync<StudyRun, RunRepositoryError>;

  loadStudyRun(id: StudyRunId): ResultAsync<StudyRun | null, RunRepositoryError>;

  /** Returns the stored record with its bumped version. */
  saveStudyRun(run: StudyRun): ResultAsync<StudyRun, RunRepositoryError>;

  listStudyRunsOfWorker(workerId: WorkerId): ResultAsync<readonly StudyRun[], RunRepositoryError>;

  /** Distinct workers that have at least one run in the batch. */
  listWorkerIdsOfBatch(batchId: BatchId): ResultAsync<ReadonlySet<WorkerId>, RunRepositoryError>;

  createComponentRun(draft: NewComponentRun): ResultAsync<ComponentRun, RunRepositoryError>;

  removeComponentRun(id: ComponentRunId): ResultAsync<void, RunRepositoryError>;

  saveComponentRun(run: ComponentRun): ResultAsync<ComponentRun, RunRepositoryError>;

  listComponentRuns(studyRunId: StudyRunId): ResultAsync<readonly ComponentRun[], RunRepositoryError>;
}
