import type { BatchId, StudyId, WorkerId } from '../domain/ids.js';
import type { WorkerKind } from '../domain/worker.js';

export type AuthorizationError =
  | { readonly code: 'BATCH_INACTIVE'; readonly message: string; readonly batchId: BatchId }
  | { readonly code: 'BATCH_NOT_IN_STUDY'; readonly message: string; readonly batchId: BatchId; readonly studyId: StudyId }
  | {
      readonly code: 'WORKER_KIND_NOT_ALLOWED';
      readonly message: string;
      readonly batchId: BatchId;
      readonly workerKind: WorkerKind;
    }
  | { readonly code: 'BATCH_FULL'; readonly message: string; readonly batchId: BatchId; readonly maxTotalWorkers: number }
  | { readonly code: 'WORKER_ALREADY_DID_STUDY'; readonly message: string; readonly workerId: WorkerId; readonly studyId: StudyId }
  | { readonly code: 'WORKER_SESSION_ENDED'; readonly message: string; readonly workerId: WorkerId; readonly studyId: StudyId }
  | { readonly code: 'PREVIEW_NOT_ALLOWED'; readonly message: string; readonly studyId: StudyId };
