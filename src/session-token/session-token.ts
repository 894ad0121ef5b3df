import type { Brand } from '../runtime/brand.js';
import type {
  BatchId,
  ComponentId,
  ComponentRunId,
  EpochMs,
  GroupRunId,
  StudyId,
  StudyRunId,
  WorkerId,
} from '../domain/ids.js';
import type { WorkerKind } from '../domain/worker.js';

/**
 * Concurrent study runs one browser may hold. The slot is the single trailing
 * digit of the cookie name, so this cannot exceed 10.
 */
export const TOKEN_SLOT_CAPACITY = 10;

/** 0..TOKEN_SLOT_CAPACITY-1 */
export type TokenSlot = Brand<number, 'TokenSlot'>;

export function parseTokenSlot(value: number): TokenSlot | null {
  return Number.isInteger(value) && value >= 0 && value < TOKEN_SLOT_CAPACITY ? (value as TokenSlot) : null;
}

/**
 * Client-held proof binding one browser slot to one study run.
 *
 * Component fields are null until the run's first component starts; groupRunId
 * stays null unless the study runs in groups.
 */
export interface SessionToken {
  readonly slot: TokenSlot;
  readonly workerId: WorkerId;
  readonly workerKind: WorkerKind;
  readonly batchId: BatchId;
  readonly studyId: StudyId;
  readonly studyRunId: StudyRunId;
  readonly componentId: ComponentId | null;
  readonly componentRunId: ComponentRunId | null;
  readonly componentPosition: number | null;
  readonly groupRunId: GroupRunId | null;
  readonly creationTime: EpochMs;
}
