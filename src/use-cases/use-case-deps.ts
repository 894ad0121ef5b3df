import type { Result, ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import type { RunLifecycle } from '../lifecycle/run-lifecycle.js';
import type { RunQueries } from '../lifecycle/run-queries.js';
import type { RunRepositoryPort } from '../ports/run-repository.port.js';
import type { StudyCatalogPort } from '../ports/study-catalog.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import type { WorkerDirectoryPort } from '../ports/worker-directory.port.js';
import type { SessionTokenStore } from '../session-token/session-token-store.js';
import type { UseCaseError } from './errors.js';

export interface UseCaseDeps {
  readonly repo: RunRepositoryPort;
  readonly catalog: StudyCatalogPort;
  readonly workers: WorkerDirectoryPort;
  readonly clock: TimeClockPort;
  readonly tokens: SessionTokenStore;
  readonly lifecycle: RunLifecycle;
  readonly queries: RunQueries;
  readonly logger: Logger;
}

/**
 * Carries a typed error out of an async use-case body.
 * Only `runUseCase` catches it.
 */
export class UseCaseFailure extends Error {
  constructor(readonly useCaseError: UseCaseError) {
    super(useCaseError.message);
  }
}

/**
 * Runs an async body written in direct style. A UseCaseFailure becomes the
 * error value; anything else thrown is a bug and surfaces as REPOSITORY_FAILURE
 * so the request still gets an answer.
 */
export function runUseCase<T>(body: () => Promise<T>): ResultAsync<T, UseCaseError> {
  return RA.fromPromise<T, UseCaseError>(body(), (e) => {
    if (e instanceof UseCaseFailure) return e.useCaseError;
    return { code: 'REPOSITORY_FAILURE', message: e instanceof Error ? e.message : String(e), cause: e };
  });
}

export async function unwrap<T, E extends UseCaseError>(ra: ResultAsync<T, E>): Promise<T> {
  return ra.match(
    (v) => v,
    (e) => {
      throw new UseCaseFailure(e);
    }
  );
}

export function unwrapSync<T, E extends UseCaseError>(r: Result<T, E>): T {
  if (r.isErr()) throw new UseCaseFailure(r.error);
  return r.value;
}

export function fail(error: UseCaseError): never {
  throw new UseCaseFailure(error);
}
