import type { StudyRunId } from '../domain/ids.js';
import type { TokenSlot } from './session-token.js';

export type TokenMalformedError = {
  readonly code: 'TOKEN_MALFORMED';
  readonly message: string;
  readonly cookieName: string;
  /** Wire key that failed, or 'name' / 'pair' for structural problems */
  readonly field: string;
};

export type TokenCapacityExceededError = {
  readonly code: 'TOKEN_CAPACITY_EXCEEDED';
  readonly message: string;
  readonly capacity: number;
};

export type TokenSlotConflictError = {
  readonly code: 'TOKEN_SLOT_CONFLICT';
  readonly message: string;
  readonly slot: TokenSlot;
  readonly studyRunId: StudyRunId;
  readonly occupiedBy: StudyRunId;
};

export type TokenDuplicateRunError = {
  readonly code: 'TOKEN_DUPLICATE_RUN';
  readonly message: string;
  readonly studyRunId: StudyRunId;
  readonly slot: TokenSlot;
  readonly existingSlot: TokenSlot;
};

export type TokenAddError = TokenCapacityExceededError | TokenSlotConflictError | TokenDuplicateRunError;

export type SessionTokenError = TokenMalformedError | TokenAddError;
