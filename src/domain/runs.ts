import type { BatchId, ComponentId, ComponentRunId, EpochMs, StudyId, StudyRunId, WorkerId } from './ids.js';

export type StudyRunState = 'STARTED' | 'FINISHED' | 'FAIL';

/**
 * Ordered: a component run only ever moves to a higher index.
 * FINISHED and FAIL are terminal.
 */
export const COMPONENT_RUN_STATES = ['STARTED', 'DATA_RETRIEVED', 'RESULTDATA_POSTED', 'FINISHED', 'FAIL'] as const;

export type ComponentRunState = (typeof COMPONENT_RUN_STATES)[number];

export interface StudyRun {
  readonly id: StudyRunId;
  readonly studyId: StudyId;
  readonly batchId: BatchId;
  readonly workerId: WorkerId;
  readonly state: StudyRunState;
  readonly confirmationCode: string | null;
  readonly errorMessage: string | null;
  readonly startTime: EpochMs;
  readonly endTime: EpochMs | null;
  /** Optimistic concurrency; bumped by the repository on every save. */
  readonly version: number;
}

export interface ComponentRun {
  readonly id: ComponentRunId;
  readonly studyRunId: StudyRunId;
  readonly componentId: ComponentId;
  /** 1-based position of the component within the study */
  readonly position: number;
  readonly state: ComponentRunState;
  readonly data: string | null;
  readonly startTime: EpochMs;
  readonly endTime: EpochMs | null;
}

export type NewStudyRun = Omit<StudyRun, 'id' | 'version'>;
export type NewComponentRun = Omit<ComponentRun, 'id'>;

export function isStudyRunTerminal(run: Pick<StudyRun, 'state'>): boolean {
  return run.state === 'FINISHED' || run.state === 'FAIL';
}

export function isComponentRunTerminal(run: Pick<ComponentRun, 'state'>): boolean {
  return run.state === 'FINISHED' || run.state === 'FAIL';
}

export function componentRunStateIndex(state: ComponentRunState): number {
  return COMPONENT_RUN_STATES.indexOf(state);
}
