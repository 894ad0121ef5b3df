import type { UseCaseError } from '../use-cases/errors.js';
import { assertNever } from '../runtime/assert-never.js';

export type HttpStatus = 400 | 403 | 404 | 409 | 500 | 503;

export function httpStatusFor(error: UseCaseError): HttpStatus {
  switch (error.code) {
    case 'STUDY_NOT_FOUND':
    case 'BATCH_NOT_FOUND':
    case 'WORKER_NOT_FOUND':
    case 'STUDY_RUN_NOT_FOUND':
    case 'COMPONENT_NOT_FOUND':
      return 404;

    case 'NO_SESSION_TOKEN':
    case 'COMPONENT_NOT_IN_STUDY':
    case 'COMPONENT_NOT_STARTED':
    case 'STUDY_HAS_NO_ACTIVE_COMPONENTS':
      return 400;

    case 'BATCH_INACTIVE':
    case 'BATCH_NOT_IN_STUDY':
    case 'WORKER_KIND_NOT_ALLOWED':
    case 'BATCH_FULL':
    case 'WORKER_ALREADY_DID_STUDY':
    case 'WORKER_SESSION_ENDED':
    case 'PREVIEW_NOT_ALLOWED':
    case 'WORKER_NEVER_STARTED_STUDY':
    case 'WORKER_NEVER_DID_STUDY':
    case 'STUDY_RUN_NOT_OWNED':
    case 'STUDY_RUN_ALREADY_DONE':
    case 'STUDY_RUN_TERMINAL':
    case 'COMPONENT_NOT_ACTIVE':
    case 'COMPONENT_RELOAD_FORBIDDEN':
    case 'COMPONENT_ALREADY_FINISHED_OR_FAILED':
    case 'COMPONENT_RUN_TERMINAL':
    case 'TOKEN_CAPACITY_EXCEEDED':
      return 403;

    // Lost a race; the client may retry.
    case 'STALE_WRITE':
    case 'TOKEN_SLOT_CONFLICT':
    case 'TOKEN_DUPLICATE_RUN':
      return 409;

    case 'CATALOG_UNAVAILABLE':
    case 'WORKER_DIRECTORY_UNAVAILABLE':
      return 503;

    case 'REPOSITORY_FAILURE':
    case 'RECORD_NOT_FOUND':
      return 500;

    default:
      return assertNever(error);
  }
}
