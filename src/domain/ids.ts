import type { Brand } from '../runtime/brand.js';

// Numeric record ids, as issued by the repository and carried in session tokens.
export type WorkerId = Brand<number, 'WorkerId'>;
export type StudyId = Brand<number, 'StudyId'>;
export type ComponentId = Brand<number, 'ComponentId'>;
export type BatchId = Brand<number, 'BatchId'>;
export type StudyRunId = Brand<number, 'StudyRunId'>;
export type ComponentRunId = Brand<number, 'ComponentRunId'>;
export type GroupRunId = Brand<number, 'GroupRunId'>;

/** Epoch milliseconds */
export type EpochMs = Brand<number, 'EpochMs'>;

export function asWorkerId(value: number): WorkerId {
  return value as WorkerId;
}

export function asStudyId(value: number): StudyId {
  return value as StudyId;
}

export function asComponentId(value: number): ComponentId {
  return value as ComponentId;
}

export function asBatchId(value: number): BatchId {
  return value as BatchId;
}

export function asStudyRunId(value: number): StudyRunId {
  return value as StudyRunId;
}

export function asComponentRunId(value: number): ComponentRunId {
  return value as ComponentRunId;
}

export function asGroupRunId(value: number): GroupRunId {
  return value as GroupRunId;
}

export function asEpochMs(value: number): EpochMs {
  return value as EpochMs;
}
