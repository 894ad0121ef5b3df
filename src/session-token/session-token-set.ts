import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { StudyRunId } from '../domain/ids.js';
import type { TokenAddError, TokenCapacityExceededError } from './errors.js';
import { parseTokenSlot, TOKEN_SLOT_CAPACITY, type SessionToken, type TokenSlot } from './session-token.js';

/**
 * The session tokens one browser holds, keyed by slot.
 *
 * Invariants:
 * - at most TOKEN_SLOT_CAPACITY tokens
 * - one token per slot
 * - one token per study run
 *
 * A failed `add` leaves the set unchanged.
 */
export class SessionTokenSet {
  private readonly bySlot = new Map<TokenSlot, SessionToken>();

  get size(): number {
    return this.bySlot.size;
  }

  isFull(): boolean {
    return this.bySlot.size >= TOKEN_SLOT_CAPACITY;
  }

  /** Ordered by slot */
  tokens(): readonly SessionToken[] {
    return [...this.bySlot.values()].sort((a, b) => a.slot - b.slot);
  }

  add(token: SessionToken): Result<void, TokenAddError> {
    if (this.isFull()) return err(capacityExceeded());

    const occupant = this.bySlot.get(token.slot);
    if (occupant) {
      return err({
        code: 'TOKEN_SLOT_CONFLICT',
        message: `Slot ${token.slot} already holds study run ${occupant.studyRunId}`,
        slot: token.slot,
        studyRunId: token.studyRunId,
        occupiedBy: occupant.studyRunId,
      });
    }

    const sameRun = this.findByStudyRunId(token.studyRunId);
    if (sameRun) {
      return err({
        code: 'TOKEN_DUPLICATE_RUN',
        message: `Study run ${token.studyRunId} already has a token in slot ${sameRun.slot}`,
        studyRunId: token.studyRunId,
        slot: token.slot,
        existingSlot: sameRun.slot,
      });
    }

    this.bySlot.set(token.slot, token);
    return ok(undefined);
  }

  /** No-op unless the token's slot holds the token's run. */
  remove(token: SessionToken): void {
    const occupant = this.bySlot.get(token.slot);
    if (occupant && occupant.studyRunId === token.studyRunId) {
      this.bySlot.delete(token.slot);
    }
  }

  findByStudyRunId(studyRunId: StudyRunId): SessionToken | null {
    for (const token of this.bySlot.values()) {
      if (token.studyRunId === studyRunId) return token;
    }
    return null;
  }

  /** Smallest unused slot */
  nextFreeSlot(): Result<TokenSlot, TokenCapacityExceededError> {
    for (let i = 0; i < TOKEN_SLOT_CAPACITY; i++) {
      const slot = parseTokenSlot(i);
      if (slot !== null && !this.bySlot.has(slot)) return ok(slot);
    }
    return err(capacityExceeded());
  }
}

function capacityExceeded(): TokenCapacityExceededError {
  return {
    code: 'TOKEN_CAPACITY_EXCEEDED',
    message: `This browser already runs ${TOKEN_SLOT_CAPACITY} studies; finish one before starting another`,
    capacity: TOKEN_SLOT_CAPACITY,
  };
}
