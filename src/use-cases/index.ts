import { createAbortStudyRun } from './abort-study-run.js';
import { createFinishComponentRun } from './finish-component-run.js';
import { createFinishStudyRun } from './finish-study-run.js';
import { createRetrieveInitData } from './retrieve-init-data.js';
import { createStartComponentRun } from './start-component-run.js';
import { createStartNextComponentRun } from './start-next-component-run.js';
import { createStartStudyRun } from './start-study-run.js';
import { createSubmitResultData } from './submit-result-data.js';
import type { UseCaseDeps } from './use-case-deps.js';

export type { UseCaseError, UseCaseErrorCode } from './errors.js';
export type { UseCaseDeps } from './use-case-deps.js';
export type { StartStudyRunInput, StartedStudyRun } from './start-study-run.js';
export type { ComponentRequest, StartedComponentRun } from './start-component-run.js';
export type { NextComponentOutcome } from './start-next-component-run.js';
export type { InitData } from './retrieve-init-data.js';
export type { SubmitResultDataInput } from './submit-result-data.js';
export type { FinishComponentRunInput } from './finish-component-run.js';
export type { FinishStudyRunInput } from './finish-study-run.js';
export type { AbortStudyRunInput } from './abort-study-run.js';
export { DEFAULT_ABORT_MESSAGE } from './abort-study-run.js';

export function createUseCases(deps: UseCaseDeps) {
  return {
    startStudyRun: createStartStudyRun(deps),
    startComponentRun: createStartComponentRun(deps),
    startNextComponentRun: createStartNextComponentRun(deps),
    retrieveInitData: createRetrieveInitData(deps),
    submitResultData: createSubmitResultData(deps),
    finishComponentRun: createFinishComponentRun(deps),
    finishStudyRun: createFinishStudyRun(deps),
    abortStudyRun: createAbortStudyRun(deps),
  };
}

export type StudyRunUseCases = ReturnType<typeof createUseCases>;
