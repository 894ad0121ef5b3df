import type { ComponentId, ComponentRunId, StudyId, StudyRunId, WorkerId } from '../domain/ids.js';
import type { ComponentRunState, StudyRunState } from '../domain/runs.js';
import type { RunRepositoryError } from '../ports/run-repository.port.js';

export type RunQueryError =
  | { readonly code: 'WORKER_NEVER_STARTED_STUDY'; readonly message: string; readonly workerId: WorkerId; readonly studyId: StudyId }
  | { readonly code: 'WORKER_NEVER_DID_STUDY'; readonly message: string; readonly workerId: WorkerId; readonly studyId: StudyId }
  | { readonly code: 'STUDY_RUN_NOT_FOUND'; readonly message: string; readonly studyRunId: StudyRunId }
  | {
      readonly code: 'STUDY_RUN_NOT_OWNED';
      readonly message: string;
      readonly studyRunId: StudyRunId;
      readonly workerId: WorkerId;
      readonly studyId: StudyId;
    }
  | { readonly code: 'STUDY_HAS_NO_ACTIVE_COMPONENTS'; readonly message: string; readonly studyId: StudyId }
  | { readonly code: 'COMPONENT_NOT_FOUND'; readonly message: string; readonly studyId: StudyId; readonly componentId: ComponentId }
  | { readonly code: 'COMPONENT_NOT_ACTIVE'; readonly message: string; readonly studyId: StudyId; readonly componentId: ComponentId }
  | RunRepositoryError;

export type RunLifecycleError =
  | {
      readonly code: 'COMPONENT_RELOAD_FORBIDDEN';
      readonly message: string;
      readonly studyId: StudyId;
      readonly componentId: ComponentId;
      readonly studyRunId: StudyRunId;
    }
  | {
      readonly code: 'COMPONENT_ALREADY_FINISHED_OR_FAILED';
      readonly message: string;
      readonly studyId: StudyId;
      readonly componentId: ComponentId;
      readonly componentRunId: ComponentRunId;
    }
  | {
      readonly code: 'COMPONENT_RUN_TERMINAL';
      readonly message: string;
      readonly componentRunId: ComponentRunId;
      readonly state: ComponentRunState;
    }
  | { readonly code: 'STUDY_RUN_TERMINAL'; readonly message: string; readonly studyRunId: StudyRunId; readonly state: StudyRunState }
  | { readonly code: 'COMPONENT_NOT_IN_STUDY'; readonly message: string; readonly studyId: StudyId; readonly componentId: ComponentId }
  | RunRepositoryError;
