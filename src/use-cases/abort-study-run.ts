import type { ResultAsync } from 'neverthrow';
import type { StudyRun } from '../domain/runs.js';
import type { RequestContext } from '../session-token/request-context.js';
import type { UseCaseError } from './errors.js';
import { resolveRunScope, type RunRequest } from './run-scope.js';
import { runUseCase, unwrap, type UseCaseDeps } from './use-case-deps.js';

export const DEFAULT_ABORT_MESSAGE = 'Aborted by the worker';

export interface AbortStudyRunInput extends RunRequest {
  readonly message: string | null;
}

/** The worker quits: collected result data is dropped, the run fails, the token goes. */
export function createAbortStudyRun(deps: UseCaseDeps) {
  return (ctx: RequestContext, input: AbortStudyRunInput): ResultAsync<StudyRun, UseCaseError> =>
    runUseCase(async () => {
      const scope = await resolveRunScope(deps, ctx, input, 'finishing');
      const run = await unwrap(deps.lifecycle.abortStudy(scope.run, input.message ?? DEFAULT_ABORT_MESSAGE));
      deps.tokens.discard(ctx, run.id);
      deps.logger.info({ studyRunId: run.id, studyId: run.studyId }, 'Study run aborted');
      return run;
    });
}
