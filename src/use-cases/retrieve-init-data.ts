import type { ResultAsync } from 'neverthrow';
import type { ComponentRun, StudyRun } from '../domain/runs.js';
import type { Batch, Component, Study } from '../domain/study.js';
import type { Worker } from '../domain/worker.js';
import { findComponentOfStudy } from '../lifecycle/run-queries.js';
import type { RequestContext } from '../session-token/request-context.js';
import type { UseCaseError } from './errors.js';
import { resolveRunScope, unwrapComponentStep, writeComponentToken } from './run-scope.js';
import type { ComponentRequest } from './start-component-run.js';
import { runUseCase, unwrap, unwrapSync, type UseCaseDeps } from './use-case-deps.js';

/** What a component page needs to set itself up. */
export interface InitData {
  readonly study: Study;
  readonly batch: Batch;
  readonly worker: Worker;
  readonly studyRun: StudyRun;
  readonly component: Component;
  readonly componentRun: ComponentRun;
}

/**
 * A component page asks for its init data once. Asking again after it has
 * moved on (e.g. the page was reloaded) restarts the component.
 */
export function createRetrieveInitData(deps: UseCaseDeps) {
  return (ctx: RequestContext, input: ComponentRequest): ResultAsync<InitData, UseCaseError> =>
    runUseCase(async () => {
      const scope = await resolveRunScope(deps, ctx, input, 'running');
      const component = unwrapSync(findComponentOfStudy(scope.study, input.componentId));

      const resumed = await unwrapComponentStep(
        deps,
        ctx,
        scope.run,
        deps.lifecycle.resumeComponent(scope.study, component, scope.run, 'STARTED')
      );
      const componentRun = await unwrap(deps.lifecycle.recordInitDataRetrieved(resumed));

      writeComponentToken(deps, ctx, scope, component, componentRun);
      return {
        study: scope.study,
        batch: scope.batch,
        worker: scope.worker,
        studyRun: scope.run,
        component,
        componentRun,
      };
    });
}
