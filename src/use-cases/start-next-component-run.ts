import type { ResultAsync } from 'neverthrow';
import type { StudyRun } from '../domain/runs.js';
import type { RequestContext } from '../session-token/request-context.js';
import type { UseCaseError } from './errors.js';
import { resolveRunScope, unwrapComponentStep, writeComponentToken, type RunRequest } from './run-scope.js';
import type { StartedComponentRun } from './start-component-run.js';
import { runUseCase, unwrap, type UseCaseDeps } from './use-case-deps.js';

export type NextComponentOutcome =
  | ({ readonly kind: 'component_started' } & StartedComponentRun)
  /** No active component left: the run was finished successfully */
  | { readonly kind: 'study_finished'; readonly studyRun: StudyRun };

/** Moves on to the next active component, or finishes the run after the last one. */
export function createStartNextComponentRun(deps: UseCaseDeps) {
  return (ctx: RequestContext, input: RunRequest): ResultAsync<NextComponentOutcome, UseCaseError> =>
    runUseCase(async (): Promise<NextComponentOutcome> => {
      const scope = await resolveRunScope(deps, ctx, input, 'running');
      const next = await unwrap(deps.queries.nextActiveComponent(scope.study, scope.run));

      if (next === null) {
        const studyRun = await unwrap(deps.lifecycle.finishStudy(true, scope.run));
        deps.tokens.discard(ctx, studyRun.id);
        return { kind: 'study_finished', studyRun };
      }

      const componentRun = await unwrapComponentStep(
        deps,
        ctx,
        scope.run,
        deps.lifecycle.startComponent(scope.study, next, scope.run)
      );
      writeComponentToken(deps, ctx, scope, next, componentRun);
      return { kind: 'component_started', studyRun: scope.run, component: next, componentRun };
    });
}
