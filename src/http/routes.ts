import express, { Router, type Request, type Response } from 'express';
import type { ResultAsync } from 'neverthrow';
import type { z, ZodTypeAny } from 'zod';
import type { Logger } from '../core/logging/index.js';
import type { RequestContext } from '../session-token/request-context.js';
import type { UseCaseError } from '../use-cases/errors.js';
import type { StudyRunUseCases } from '../use-cases/index.js';
import { applyCookieMutations, requestContextFrom } from './cookie-jar.js';
import { httpStatusFor } from './error-status.js';
import { presentComponentRun, presentInitData, presentStudyRun } from './presenters.js';
import {
  AbortStudyQuery,
  ComponentQuery,
  describeInvalidRequest,
  FinishComponentQuery,
  FinishStudyQuery,
  RunQuery,
  StartStudyRunQuery,
} from './request-params.js';

/** Result data is opaque text; this caps one submission. */
export const RESULT_DATA_LIMIT = '5mb';

type Handler<I, T> = (ctx: RequestContext, input: I, req: Request) => ResultAsync<T, UseCaseError>;

/**
 * Study-run endpoints.
 *
 * Every response carries the envelope `{ success: true, data }` or
 * `{ success: false, code, error }`; cookie changes the use case queued are
 * written right before the body.
 */
export function createStudyRunRouter(useCases: StudyRunUseCases, logger: Logger): Router {
  const router = Router();

  /**
   * Parses params + query with `schema`, runs the use case, and answers.
   * Failures are logged here and nowhere else.
   */
  function route<S extends ZodTypeAny, T, R>(
    schema: S,
    handler: Handler<z.output<S>, T>,
    present: (value: T) => R
  ) {
    return async (req: Request, res: Response): Promise<void> => {
      const ctx = requestContextFrom(req);
      try {
        const parsed = schema.safeParse({ ...req.query, ...req.params });
        if (!parsed.success) {
          applyCookieMutations(ctx, res);
          res.status(400).json({ success: false, code: 'INVALID_REQUEST', error: describeInvalidRequest(parsed.error) });
          return;
        }

        const outcome = await handler(ctx, parsed.data, req);
        applyCookieMutations(ctx, res);

        if (outcome.isOk()) {
          res.json({ success: true, data: present(outcome.value) });
          return;
        }

        const error = outcome.error;
        const status = httpStatusFor(error);
        const fields = { method: req.method, path: req.path, code: error.code, status };
        if (status >= 500) {
          logger.error({ ...fields, err: 'cause' in error ? error.cause : undefined }, error.message);
        } else {
          logger.warn(fields, error.message);
        }
        res.status(status).json({ success: false, code: error.code, error: error.message });
      } catch (error: unknown) {
        logger.error({ err: error, method: req.method, path: req.path }, 'Unhandled error in study-run route');
        if (!res.headersSent) {
          res.status(500).json({ success: false, code: 'INTERNAL_ERROR', error: 'Internal server error' });
        }
      }
    };
  }

  router.get(
    '/publix/:studyId/start',
    route(StartStudyRunQuery, useCases.startStudyRun, (started) => ({
      studyRun: presentStudyRun(started.studyRun),
      componentRun: presentComponentRun(started.componentRun, started.component),
      slot: started.token.slot,
    }))
  );

  router.post(
    '/publix/:studyId/nextComponent/start',
    route(
      RunQuery,
      (ctx, q) => useCases.startNextComponentRun(ctx, { studyId: q.studyId, studyRunId: q.srid }),
      (outcome) =>
        outcome.kind === 'study_finished'
          ? { kind: outcome.kind, studyRun: presentStudyRun(outcome.studyRun) }
          : {
              kind: outcome.kind,
              studyRun: presentStudyRun(outcome.studyRun),
              componentRun: presentComponentRun(outcome.componentRun, outcome.component),
            }
    )
  );

  router.post(
    '/publix/:studyId/end',
    route(
      FinishStudyQuery,
      (ctx, q) =>
        useCases.finishStudyRun(ctx, {
          studyId: q.studyId,
          studyRunId: q.srid,
          successful: q.successful,
          errorMessage: q.errorMsg,
        }),
      presentStudyRun
    )
  );

  router.post(
    '/publix/:studyId/abort',
    route(
      AbortStudyQuery,
      (ctx, q) => useCases.abortStudyRun(ctx, { studyId: q.studyId, studyRunId: q.srid, message: q.message }),
      presentStudyRun
    )
  );

  router.post(
    '/publix/:studyId/:componentId/start',
    route(
      ComponentQuery,
      (ctx, q) =>
        useCases.startComponentRun(ctx, { studyId: q.studyId, componentId: q.componentId, studyRunId: q.srid }),
      (started) => ({
        studyRun: presentStudyRun(started.studyRun),
        componentRun: presentComponentRun(started.componentRun, started.component),
      })
    )
  );

  router.get(
    '/publix/:studyId/:componentId/initData',
    route(
      ComponentQuery,
      (ctx, q) =>
        useCases.retrieveInitData(ctx, { studyId: q.studyId, componentId: q.componentId, studyRunId: q.srid }),
      presentInitData
    )
  );

  router.post(
    '/publix/:studyId/:componentId/resultData',
    express.text({ type: '*/*', limit: RESULT_DATA_LIMIT }),
    route(
      ComponentQuery,
      (ctx, q, req) =>
        useCases.submitResultData(ctx, {
          studyId: q.studyId,
          componentId: q.componentId,
          studyRunId: q.srid,
          data: typeof req.body === 'string' ? req.body : '',
        }),
      (componentRun) => ({ componentRunId: componentRun.id, state: componentRun.state })
    )
  );

  router.post(
    '/publix/:studyId/:componentId/end',
    route(
      FinishComponentQuery,
      (ctx, q) =>
        useCases.finishComponentRun(ctx, {
          studyId: q.studyId,
          componentId: q.componentId,
          studyRunId: q.srid,
          successful: q.successful,
        }),
      (componentRun) => ({ componentRunId: componentRun.id, state: componentRun.state })
    )
  );

  return router;
}
