import type { AuthorizationError } from '../authorization/errors.js';
import type { BatchId, ComponentId, StudyId, StudyRunId, WorkerId } from '../domain/ids.js';
import type { StudyRunState } from '../domain/runs.js';
import type { RunLifecycleError, RunQueryError } from '../lifecycle/errors.js';
import type { StudyCatalogError } from '../ports/study-catalog.port.js';
import type { WorkerDirectoryError } from '../ports/worker-directory.port.js';
import type { TokenAddError } from '../session-token/errors.js';

export type UseCaseError =
  | { readonly code: 'STUDY_NOT_FOUND'; readonly message: string; readonly studyId: StudyId }
  | {
      readonly code: 'BATCH_NOT_FOUND';
      readonly message: string;
      readonly studyId: StudyId;
      /** null: the study has no default batch */
      readonly batchId: BatchId | null;
    }
  | { readonly code: 'WORKER_NOT_FOUND'; readonly message: string; readonly workerId: WorkerId }
  | { readonly code: 'NO_SESSION_TOKEN'; readonly message: string; readonly studyRunId: StudyRunId }
  | {
      readonly code: 'STUDY_RUN_ALREADY_DONE';
      readonly message: string;
      readonly studyRunId: StudyRunId;
      readonly state: StudyRunState;
    }
  | {
      readonly code: 'COMPONENT_NOT_STARTED';
      readonly message: string;
      readonly studyRunId: StudyRunId;
      readonly componentId: ComponentId;
    }
  | StudyCatalogError
  | WorkerDirectoryError
  | AuthorizationError
  | RunQueryError
  | RunLifecycleError
  | TokenAddError;

export type UseCaseErrorCode = UseCaseError['code'];
