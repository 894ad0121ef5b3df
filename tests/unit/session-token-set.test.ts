import { describe, it, expect } from 'vitest';
import { asStudyRunId } from '../../src/domain/ids.js';
import { SessionTokenSet } from '../../src/session-token/session-token-set.js';
import { TOKEN_SLOT_CAPACITY } from '../../src/session-token/session-token.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';
import { slot, token } from '../fakes/token.fixtures.js';

function fullSet(): SessionTokenSet {
  const set = new SessionTokenSet();
  for (let i = 0; i < TOKEN_SLOT_CAPACITY; i++) expectOk(set.add(token(i, 100 + i)), `adding slot ${i}`);
  return set;
}

describe('SessionTokenSet', () => {
  it('starts empty with slot 0 free', () => {
    const set = new SessionTokenSet();
    expect(set.size).toBe(0);
    expect(set.isFull()).toBe(false);
    expect(expectOk(set.nextFreeSlot(), 'next slot')).toBe(slot(0));
  });

  it('lists tokens by slot', () => {
    const set = new SessionTokenSet();
    set.add(token(5, 1));
    set.add(token(2, 2));
    set.add(token(7, 3));
    expect(set.tokens().map((t) => t.slot)).toEqual([2, 5, 7]);
  });

  it('hands out the smallest unused slot', () => {
    const set = new SessionTokenSet();
    set.add(token(0, 1));
    set.add(token(1, 2));
    set.add(token(3, 3));
    expect(expectOk(set.nextFreeSlot(), 'next slot')).toBe(slot(2));
  });

  it('holds at most ten tokens', () => {
    const set = fullSet();
    expect(set.size).toBe(10);
    expect(set.isFull()).toBe(true);

    const error = expectErr(set.nextFreeSlot(), 'next slot of full set');
    expect(error).toEqual({
      code: 'TOKEN_CAPACITY_EXCEEDED',
      message: 'This browser already runs 10 studies; finish one before starting another',
      capacity: 10,
    });
  });

  it('rejects an eleventh token and stays unchanged', () => {
    const set = fullSet();
    const before = set.tokens();

    expect(expectErr(set.add(token(3, 999)), 'adding to full set').code).toBe('TOKEN_CAPACITY_EXCEEDED');
    expect(set.tokens()).toEqual(before);
  });

  it('rejects a token for an occupied slot', () => {
    const set = new SessionTokenSet();
    set.add(token(4, 1));

    const error = expectErr(set.add(token(4, 2)), 'adding to occupied slot');
    expect(error).toEqual({
      code: 'TOKEN_SLOT_CONFLICT',
      message: 'Slot 4 already holds study run 1',
      slot: slot(4),
      studyRunId: asStudyRunId(2),
      occupiedBy: asStudyRunId(1),
    });
    expect(set.findByStudyRunId(asStudyRunId(1))?.slot).toBe(4);
    expect(set.findByStudyRunId(asStudyRunId(2))).toBeNull();
  });

  it('rejects a second token for the same run', () => {
    const set = new SessionTokenSet();
    set.add(token(0, 1));

    const error = expectErr(set.add(token(6, 1)), 'adding duplicate run');
    expect(error).toMatchObject({ code: 'TOKEN_DUPLICATE_RUN', slot: 6, existingSlot: 0 });
    expect(set.size).toBe(1);
  });

  it('removes by slot and run, ignoring tokens it does not hold', () => {
    const set = new SessionTokenSet();
    set.add(token(0, 1));
    set.add(token(1, 2));

    set.remove(token(0, 2));
    expect(set.size).toBe(2);

    set.remove(token(9, 3));
    expect(set.size).toBe(2);

    set.remove(token(0, 1));
    expect(set.size).toBe(1);
    expect(set.findByStudyRunId(asStudyRunId(1))).toBeNull();
    expect(expectOk(set.nextFreeSlot(), 'next slot')).toBe(slot(0));
  });

  it('frees room once a token leaves a full set', () => {
    const set = fullSet();
    set.remove(token(7, 107));
    expect(expectOk(set.nextFreeSlot(), 'next slot')).toBe(slot(7));
    expectOk(set.add(token(7, 500)), 'refilling');
    expect(set.isFull()).toBe(true);
  });
});
