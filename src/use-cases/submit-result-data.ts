import type { ResultAsync } from 'neverthrow';
import type { ComponentRun } from '../domain/runs.js';
import { findComponentOfStudy } from '../lifecycle/run-queries.js';
import type { RequestContext } from '../session-token/request-context.js';
import type { UseCaseError } from './errors.js';
import { resolveRunScope, unwrapComponentStep, writeComponentToken } from './run-scope.js';
import type { ComponentRequest } from './start-component-run.js';
import { runUseCase, unwrap, unwrapSync, type UseCaseDeps } from './use-case-deps.js';

export interface SubmitResultDataInput extends ComponentRequest {
  readonly data: string;
}

/** Stores the component's result data; a later submission replaces it. */
export function createSubmitResultData(deps: UseCaseDeps) {
  return (ctx: RequestContext, input: SubmitResultDataInput): ResultAsync<ComponentRun, UseCaseError> =>
    runUseCase(async () => {
      const scope = await resolveRunScope(deps, ctx, input, 'running');
      const component = unwrapSync(findComponentOfStudy(scope.study, input.componentId));

      const resumed = await unwrapComponentStep(
        deps,
        ctx,
        scope.run,
        deps.lifecycle.resumeComponent(scope.study, component, scope.run, 'RESULTDATA_POSTED')
      );
      const componentRun = await unwrap(deps.lifecycle.recordResultData(resumed, input.data));

      writeComponentToken(deps, ctx, scope, component, componentRun);
      deps.logger.debug(
        { studyRunId: scope.run.id, componentRunId: componentRun.id, bytes: input.data.length },
        'Result data stored'
      );
      return componentRun;
    });
}
