import type { ResultAsync } from 'neverthrow';
import type { StudyRun } from '../domain/runs.js';
import type { RequestContext } from '../session-token/request-context.js';
import type { UseCaseError } from './errors.js';
import { resolveRunScope, type RunRequest } from './run-scope.js';
import { runUseCase, unwrap, type UseCaseDeps } from './use-case-deps.js';

export interface FinishStudyRunInput extends RunRequest {
  readonly successful: boolean;
  readonly errorMessage: string | null;
}

/**
 * Ends the run and drops the browser's token for it.
 *
 * A run that already ended keeps its outcome and confirmation code, so a
 * worker who reloads the final page sees the same code again.
 */
export function createFinishStudyRun(deps: UseCaseDeps) {
  return (ctx: RequestContext, input: FinishStudyRunInput): ResultAsync<StudyRun, UseCaseError> =>
    runUseCase(async () => {
      const scope = await resolveRunScope(deps, ctx, input, 'finishing');
      const run = await unwrap(deps.lifecycle.finishStudy(input.successful, scope.run, input.errorMessage));
      deps.tokens.discard(ctx, run.id);
      return run;
    });
}
