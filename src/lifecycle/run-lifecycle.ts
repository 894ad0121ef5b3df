import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import type { ComponentRun, ComponentRunState, StudyRun } from '../domain/runs.js';
import { componentRunStateIndex, isComponentRunTerminal, isStudyRunTerminal } from '../domain/runs.js';
import type { Component, Study } from '../domain/study.js';
import { componentPosition } from '../domain/study.js';
import type { Worker } from '../domain/worker.js';
import type { RandomEntropyPort } from '../ports/random-entropy.port.js';
import type { RunRepositoryPort } from '../ports/run-repository.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import { generateConfirmationCode } from './confirmation-code.js';
import type { RunLifecycleError } from './errors.js';
import { selectComponentRun } from './run-queries.js';

export const ABANDONED_RUN_MESSAGE = 'Abandoned: the worker started a new run of this study';

class LifecycleFailure extends Error {
  constructor(readonly lifecycleError: RunLifecycleError) {
    super(lifecycleError.message);
  }
}

/**
 * State machine for study runs and their component runs.
 *
 * StudyRun:     STARTED -> FINISHED | FAIL
 * ComponentRun: STARTED -> DATA_RETRIEVED -> RESULTDATA_POSTED -> FINISHED | FAIL
 *
 * Terminal states are final. At most one component run per study run is
 * non-terminal; starting a component force-finishes the others.
 *
 * Every method takes the records it mutates and returns the stored result.
 * Repository errors pass through untouched.
 */
export class RunLifecycle {
  constructor(
    private readonly repo: RunRepositoryPort,
    private readonly clock: TimeClockPort,
    private readonly entropy: RandomEntropyPort,
    private readonly logger: Logger
  ) {}

  /**
   * Starts (or restarts) `component` within `run`.
   *
   * A component that already has a run in this study run:
   * - reloadable: the old component run is deleted and a fresh one created
   * - otherwise: the old component run is marked FAIL, the whole study run is
   *   finished as FAIL, and COMPONENT_RELOAD_FORBIDDEN is returned. The study
   *   run is failed even though the call returns an error.
   *
   * A study run that already ended takes no new component runs
   * (STUDY_RUN_TERMINAL).
   */
  startComponent(study: Study, component: Component, run: StudyRun): ResultAsync<ComponentRun, RunLifecycleError> {
    return this.wrap(this.startComponentImpl(study, component, run));
  }

  /**
   * Ends the study run. Success stores a confirmation code; failure stores none.
   *
   * Already terminal: returned as is, nothing written. A racing finisher that
   * saved first (STALE_WRITE) wins; its stored outcome is returned.
   */
  finishStudy(successful: boolean, run: StudyRun, errorMessage: string | null = null): ResultAsync<StudyRun, RunLifecycleError> {
    return this.wrap(this.finishStudyImpl(successful, run, errorMessage));
  }

  /**
   * The worker gave up: result data collected so far is dropped and the run
   * ends as FAIL. A terminal run is returned unchanged.
   */
  abortStudy(run: StudyRun, message: string): ResultAsync<StudyRun, RunLifecycleError> {
    return this.wrap(this.abortStudyImpl(run, message));
  }

  /**
   * Fails every run of `worker` on `study` still in STARTED, so a worker has at
   * most one live run per study. Returns the runs it failed.
   */
  abandonStaleRuns(worker: Worker, study: Study): ResultAsync<readonly StudyRun[], RunLifecycleError> {
    return this.wrap(this.abandonStaleRunsImpl(worker, study));
  }

  /**
   * The component run a request for `component` should continue.
   *
   * - never started: started now
   * - terminal: COMPONENT_ALREADY_FINISHED_OR_FAILED
   * - progressed past `maxAllowedState` (e.g. the page was reloaded): restarted
   */
  resumeComponent(
    study: Study,
    component: Component,
    run: StudyRun,
    maxAllowedState: ComponentRunState
  ): ResultAsync<ComponentRun, RunLifecycleError> {
    return this.wrap(this.resumeComponentImpl(study, component, run, maxAllowedState));
  }

  recordInitDataRetrieved(componentRun: ComponentRun): ResultAsync<ComponentRun, RunLifecycleError> {
    return this.wrap(this.advance(componentRun, 'DATA_RETRIEVED', {}));
  }

  recordResultData(componentRun: ComponentRun, data: string): ResultAsync<ComponentRun, RunLifecycleError> {
    return this.wrap(this.advance(componentRun, 'RESULTDATA_POSTED', { data }));
  }

  /** Idempotent: a terminal component run is returned unchanged. */
  finishComponent(componentRun: ComponentRun, successful: boolean): ResultAsync<ComponentRun, RunLifecycleError> {
    if (isComponentRunTerminal(componentRun)) return this.wrap(Promise.resolve(componentRun));
    return this.wrap(
      this.unwrap(
        this.repo.saveComponentRun({
          ...componentRun,
          state: successful ? 'FINISHED' : 'FAIL',
          endTime: this.clock.nowMs(),
        })
      )
    );
  }

  // ---------------------------------------------------------------------------

  private async startComponentImpl(study: Study, component: Component, run: StudyRun): Promise<ComponentRun> {
    if (isStudyRunTerminal(run)) {
      throw new LifecycleFailure({
        code: 'STUDY_RUN_TERMINAL',
        message: `Study run ${run.id} already ended (${run.state})`,
        studyRunId: run.id,
        state: run.state,
      });
    }

    const position = componentPosition(study, component.id);
    if (position === null) {
      throw new LifecycleFailure({
        code: 'COMPONENT_NOT_IN_STUDY',
        message: `Component ${component.id} doesn't belong to study ${study.id}`,
        studyId: study.id,
        componentId: component.id,
      });
    }

    let componentRuns = await this.unwrap(this.repo.listComponentRuns(run.id));
    const existing = selectComponentRun(componentRuns, component.id);

    if (existing) {
      if (component.reloadable) {
        await this.unwrap(this.repo.removeComponentRun(existing.id));
        componentRuns = componentRuns.filter((c) => c.id !== existing.id);
      } else {
        if (!isComponentRunTerminal(existing)) {
          await this.unwrap(
            this.repo.saveComponentRun({ ...existing, state: 'FAIL', endTime: this.clock.nowMs() })
          );
        }
        const message = `Component ${component.id} of study ${study.id} isn't allowed to be reloaded`;
        await this.finishStudyImpl(false, run, message);
        this.logger.warn(
          { studyId: study.id, componentId: component.id, studyRunId: run.id },
          'Reload of non-reloadable component; study run failed'
        );
        throw new LifecycleFailure({
          code: 'COMPONENT_RELOAD_FORBIDDEN',
          message,
          studyId: study.id,
          componentId: component.id,
          studyRunId: run.id,
        });
      }
    }

    await this.finishOpenComponentRuns(componentRuns);

    return this.unwrap(
      this.repo.createComponentRun({
        studyRunId: run.id,
        componentId: component.id,
        position,
        state: 'STARTED',
        data: null,
        startTime: this.clock.nowMs(),
        endTime: null,
      })
    );
  }

  private async finishStudyImpl(successful: boolean, run: StudyRun, errorMessage: string | null): Promise<StudyRun> {
    if (isStudyRunTerminal(run)) return run;

    const componentRuns = await this.unwrap(this.repo.listComponentRuns(run.id));
    await this.finishOpenComponentRuns(componentRuns);

    const next: StudyRun = {
      ...run,
      state: successful ? 'FINISHED' : 'FAIL',
      confirmationCode: successful ? generateConfirmationCode(this.entropy) : null,
      errorMessage,
      endTime: this.clock.nowMs(),
    };

    const saved = await this.repo.saveStudyRun(next).match(
      (stored) => ({ kind: 'saved' as const, stored }),
      (e) => ({ kind: 'failed' as const, error: e })
    );
    if (saved.kind === 'saved') {
      this.logger.info({ studyRunId: run.id, studyId: run.studyId, state: saved.stored.state }, 'Study run finished');
      return saved.stored;
    }
    if (saved.error.code !== 'STALE_WRITE') throw new LifecycleFailure(saved.error);

    // Someone else saved first. If they ended the run, theirs is the outcome.
    const current = await this.unwrap(this.repo.loadStudyRun(run.id));
    if (current && isStudyRunTerminal(current)) {
      this.logger.info({ studyRunId: run.id, state: current.state }, 'Study run already finished by a concurrent request');
      return current;
    }
    throw new LifecycleFailure(saved.error);
  }

  private async abortStudyImpl(run: StudyRun, message: string): Promise<StudyRun> {
    if (isStudyRunTerminal(run)) return run;

    const componentRuns = await this.unwrap(this.repo.listComponentRuns(run.id));
    for (const componentRun of componentRuns) {
      if (componentRun.data === null) continue;
      await this.unwrap(this.repo.saveComponentRun({ ...componentRun, data: null }));
    }
    return this.finishStudyImpl(false, run, message);
  }

  private async abandonStaleRunsImpl(worker: Worker, study: Study): Promise<readonly StudyRun[]> {
    const runs = await this.unwrap(this.repo.listStudyRunsOfWorker(worker.id));
    const stale = runs.filter((r) => r.studyId === study.id && r.state === 'STARTED');

    const abandoned: StudyRun[] = [];
    for (const run of stale) {
      abandoned.push(await this.finishStudyImpl(false, run, ABANDONED_RUN_MESSAGE));
    }
    if (abandoned.length > 0) {
      this.logger.info(
        { workerId: worker.id, studyId: study.id, studyRunIds: abandoned.map((r) => r.id) },
        'Abandoned stale study runs'
      );
    }
    return abandoned;
  }

  private async resumeComponentImpl(
    study: Study,
    component: Component,
    run: StudyRun,
    maxAllowedState: ComponentRunState
  ): Promise<ComponentRun> {
    const componentRuns = await this.unwrap(this.repo.listComponentRuns(run.id));
    const current = selectComponentRun(componentRuns, component.id);

    if (!current) return this.startComponentImpl(study, component, run);

    if (isComponentRunTerminal(current)) {
      throw new LifecycleFailure({
        code: 'COMPONENT_ALREADY_FINISHED_OR_FAILED',
        message: `Component ${component.id} of study ${study.id} is already finished or failed`,
        studyId: study.id,
        componentId: component.id,
        componentRunId: current.id,
      });
    }

    if (componentRunStateIndex(current.state) > componentRunStateIndex(maxAllowedState)) {
      this.logger.debug(
        { componentRunId: current.id, state: current.state, maxAllowedState },
        'Component run progressed past the requested state; restarting component'
      );
      return this.startComponentImpl(study, component, run);
    }

    return current;
  }

  private async advance(
    componentRun: ComponentRun,
    target: ComponentRunState,
    patch: Partial<Pick<ComponentRun, 'data'>>
  ): Promise<ComponentRun> {
    if (isComponentRunTerminal(componentRun)) {
      throw new LifecycleFailure({
        code: 'COMPONENT_RUN_TERMINAL',
        message: `Component run ${componentRun.id} is already ${componentRun.state}`,
        componentRunId: componentRun.id,
        state: componentRun.state,
      });
    }
    // Monotone: never move back to a lower state.
    const state =
      componentRunStateIndex(target) >= componentRunStateIndex(componentRun.state) ? target : componentRun.state;
    return this.unwrap(this.repo.saveComponentRun({ ...componentRun, ...patch, state }));
  }

  private async finishOpenComponentRuns(componentRuns: readonly ComponentRun[]): Promise<void> {
    for (const componentRun of componentRuns) {
      if (isComponentRunTerminal(componentRun)) continue;
      await this.unwrap(
        this.repo.saveComponentRun({ ...componentRun, state: 'FINISHED', endTime: this.clock.nowMs() })
      );
    }
  }

  private wrap<T>(promise: Promise<T>): ResultAsync<T, RunLifecycleError> {
    return RA.fromPromise<T, RunLifecycleError>(promise, (e) => {
      if (e instanceof LifecycleFailure) return e.lifecycleError;
      return { code: 'REPOSITORY_FAILURE', message: e instanceof Error ? e.message : String(e), cause: e };
    });
  }

  private async unwrap<T, E extends RunLifecycleError>(ra: ResultAsync<T, E>): Promise<T> {
    return ra.match(
      (v) => v,
      (e) => {
        throw new LifecycleFailure(e);
      }
    );
  }
}
