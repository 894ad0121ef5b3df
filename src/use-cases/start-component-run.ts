import type { ResultAsync } from 'neverthrow';
import type { ComponentId } from '../domain/ids.js';
import type { ComponentRun, StudyRun } from '../domain/runs.js';
import type { Component } from '../domain/study.js';
import { findComponentOfStudy } from '../lifecycle/run-queries.js';
import type { RequestContext } from '../session-token/request-context.js';
import type { UseCaseError } from './errors.js';
import { resolveRunScope, unwrapComponentStep, writeComponentToken, type RunRequest } from './run-scope.js';
import { runUseCase, unwrapSync, type UseCaseDeps } from './use-case-deps.js';

export interface ComponentRequest extends RunRequest {
  readonly componentId: ComponentId;
}

export interface StartedComponentRun {
  readonly studyRun: StudyRun;
  readonly component: Component;
  readonly componentRun: ComponentRun;
}

/**
 * Moves the run on to a component (or restarts it).
 *
 * Reloading a component that doesn't allow it ends the whole run as FAIL;
 * the browser's token for the run is dropped along with it.
 */
export function createStartComponentRun(deps: UseCaseDeps) {
  return (ctx: RequestContext, input: ComponentRequest): ResultAsync<StartedComponentRun, UseCaseError> =>
    runUseCase(async () => {
      const scope = await resolveRunScope(deps, ctx, input, 'running');
      const component = unwrapSync(findComponentOfStudy(scope.study, input.componentId));

      const componentRun = await unwrapComponentStep(
        deps,
        ctx,
        scope.run,
        deps.lifecycle.startComponent(scope.study, component, scope.run)
      );

      writeComponentToken(deps, ctx, scope, component, componentRun);
      return { studyRun: scope.run, component, componentRun };
    });
}
