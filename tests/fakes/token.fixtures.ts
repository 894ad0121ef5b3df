import {
  asBatchId,
  asComponentId,
  asComponentRunId,
  asEpochMs,
  asStudyId,
  asStudyRunId,
  asWorkerId,
} from '../../src/domain/ids.js';
import { parseTokenSlot, type SessionToken, type TokenSlot } from '../../src/session-token/session-token.js';

export function slot(n: number): TokenSlot {
  const parsed = parseTokenSlot(n);
  if (parsed === null) throw new Error(`Not a token slot: ${n}`);
  return parsed;
}

/** A well-formed token with component fields set; override what the test cares about. */
export function token(slotNumber: number, studyRunId: number, overrides: Partial<Omit<SessionToken, 'slot' | 'studyRunId'>> = {}): SessionToken {
  return {
    slot: slot(slotNumber),
    workerId: asWorkerId(104),
    workerKind: 'GeneralMultiple',
    batchId: asBatchId(1),
    studyId: asStudyId(1),
    studyRunId: asStudyRunId(studyRunId),
    componentId: asComponentId(11),
    componentRunId: asComponentRunId(studyRunId * 10),
    componentPosition: 1,
    groupRunId: null,
    creationTime: asEpochMs(1_700_000_000_000),
    ...overrides,
  };
}
