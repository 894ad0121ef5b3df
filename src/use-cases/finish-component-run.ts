import type { ResultAsync } from 'neverthrow';
import type { ComponentRun } from '../domain/runs.js';
import { findComponentOfStudy } from '../lifecycle/run-queries.js';
import type { RequestContext } from '../session-token/request-context.js';
import type { UseCaseError } from './errors.js';
import { resolveRunScope } from './run-scope.js';
import type { ComponentRequest } from './start-component-run.js';
import { fail, runUseCase, unwrap, unwrapSync, type UseCaseDeps } from './use-case-deps.js';

export interface FinishComponentRunInput extends ComponentRequest {
  readonly successful: boolean;
}

/** Ends the component run. Ending it twice returns the first outcome. */
export function createFinishComponentRun(deps: UseCaseDeps) {
  return (ctx: RequestContext, input: FinishComponentRunInput): ResultAsync<ComponentRun, UseCaseError> =>
    runUseCase(async () => {
      const scope = await resolveRunScope(deps, ctx, input, 'running');
      const component = unwrapSync(findComponentOfStudy(scope.study, input.componentId));

      const current =
        (await unwrap(deps.queries.findComponentRun(component, scope.run))) ??
        fail({
          code: 'COMPONENT_NOT_STARTED',
          message: `Component ${component.id} was never started in study run ${scope.run.id}`,
          studyRunId: scope.run.id,
          componentId: component.id,
        });

      return unwrap(deps.lifecycle.finishComponent(current, input.successful));
    });
}
