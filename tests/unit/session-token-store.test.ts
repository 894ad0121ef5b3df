import { describe, it, expect, beforeEach } from 'vitest';
import { asStudyRunId } from '../../src/domain/ids.js';
import { RequestContext } from '../../src/session-token/request-context.js';
import { SessionTokenCodec } from '../../src/session-token/session-token-codec.js';
import { SessionTokenStore } from '../../src/session-token/session-token-store.js';
import { CapturingLoggerFactory } from '../helpers/capturing-logger.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';
import { slot, token } from '../fakes/token.fixtures.js';

const codec = new SessionTokenCodec('STUDY_RUN_IDS');

function cookieFor(slotNumber: number, studyRunId: number) {
  const t = token(slotNumber, studyRunId);
  return { name: codec.cookieNameFor(t.slot), value: codec.encode(t) };
}

describe('SessionTokenStore', () => {
  let loggers: CapturingLoggerFactory;
  let store: SessionTokenStore;

  beforeEach(() => {
    loggers = new CapturingLoggerFactory();
    store = new SessionTokenStore(codec, { path: '/', maxAgeSeconds: 3600 }, loggers.create('SessionTokenStore'));
  });

  describe('currentSet', () => {
    it('decodes token cookies and ignores everything else', () => {
      const ctx = new RequestContext([cookieFor(0, 1), cookieFor(3, 2), { name: 'theme', value: 'dark' }]);
      const set = store.currentSet(ctx);
      expect(set.tokens().map((t) => t.studyRunId)).toEqual([1, 2]);
      expect(ctx.pendingCookieMutations()).toEqual([]);
    });

    it('decodes once per request', () => {
      const ctx = new RequestContext([cookieFor(0, 1)]);
      expect(store.currentSet(ctx)).toBe(store.currentSet(ctx));
    });

    it('drops a malformed cookie, queues its deletion and logs a warning', () => {
      const missingRunId = cookieFor(2, 5).value.replace('&studyResultId=5', '');
      const ctx = new RequestContext([cookieFor(0, 1), { name: 'STUDY_RUN_IDS_2', value: missingRunId }]);

      const set = store.currentSet(ctx);

      expect(set.size).toBe(1);
      expect(ctx.pendingCookieMutations()).toEqual([{ kind: 'delete', name: 'STUDY_RUN_IDS_2', path: '/' }]);
      const warnings = loggers.at('warn');
      expect(warnings).toHaveLength(1);
      expect(warnings[0]?.fields).toMatchObject({ cookieName: 'STUDY_RUN_IDS_2', field: 'studyResultId' });
    });

    it('drops a cookie whose run already sits in another slot', () => {
      const ctx = new RequestContext([
        cookieFor(0, 1),
        { name: 'STUDY_RUN_IDS_4', value: codec.encode(token(4, 1)) },
      ]);

      const set = store.currentSet(ctx);

      expect(set.tokens().map((t) => t.slot)).toEqual([0]);
      expect(ctx.pendingCookieMutations()).toEqual([{ kind: 'delete', name: 'STUDY_RUN_IDS_4', path: '/' }]);
      expect(loggers.at('warn')[0]?.msg).toBe('Discarded conflicting session token');
    });

    it('never logs cookie values', () => {
      const ctx = new RequestContext([{ name: 'STUDY_RUN_IDS_1', value: 'studyResultId=oops' }]);
      store.currentSet(ctx);
      expect(JSON.stringify(loggers.logs)).not.toContain('studyResultId=oops');
    });
  });

  describe('allocateSlot', () => {
    it('keeps the slot a run already holds', () => {
      const ctx = new RequestContext([cookieFor(0, 1), cookieFor(5, 2)]);
      expect(expectOk(store.allocateSlot(ctx, asStudyRunId(2)), 'allocating')).toBe(slot(5));
    });

    it('hands a new run the first free slot', () => {
      const ctx = new RequestContext([cookieFor(0, 1), cookieFor(1, 2)]);
      expect(expectOk(store.allocateSlot(ctx, asStudyRunId(3)), 'allocating')).toBe(slot(2));
    });

    it('fails when all ten slots are taken', () => {
      const ctx = new RequestContext(Array.from({ length: 10 }, (_, i) => cookieFor(i, i + 1)));
      expect(expectErr(store.allocateSlot(ctx, asStudyRunId(99)), 'allocating').code).toBe('TOKEN_CAPACITY_EXCEEDED');
    });
  });

  describe('write', () => {
    it('adds the token and queues its cookie', () => {
      const ctx = new RequestContext([]);
      const t = token(0, 7);

      expectOk(store.write(ctx, t), 'writing');

      expect(store.find(ctx, asStudyRunId(7))).toEqual(t);
      expect(ctx.pendingCookieMutations()).toEqual([
        { kind: 'set', name: 'STUDY_RUN_IDS_0', value: codec.encode(t), maxAgeSeconds: 3600, path: '/' },
      ]);
    });

    it('replaces the run token in place', () => {
      const ctx = new RequestContext([cookieFor(2, 7)]);
      const updated = token(2, 7, { componentPosition: 2 });

      expectOk(store.write(ctx, updated), 'writing');

      expect(store.find(ctx, asStudyRunId(7))?.componentPosition).toBe(2);
      expect(ctx.pendingCookieMutations()).toHaveLength(1);
    });

    it('deletes the old cookie when the run moves slot', () => {
      const ctx = new RequestContext([cookieFor(2, 7)]);

      expectOk(store.write(ctx, token(4, 7)), 'writing');

      expect(ctx.pendingCookieMutations().map((m) => [m.kind, m.name])).toEqual([
        ['delete', 'STUDY_RUN_IDS_2'],
        ['set', 'STUDY_RUN_IDS_4'],
      ]);
    });

    it('refuses a slot another run holds and changes nothing', () => {
      const ctx = new RequestContext([cookieFor(1, 1), cookieFor(2, 7)]);

      const error = expectErr(store.write(ctx, token(1, 7)), 'writing');

      expect(error.code).toBe('TOKEN_SLOT_CONFLICT');
      expect(store.find(ctx, asStudyRunId(7))?.slot).toBe(2);
      expect(ctx.pendingCookieMutations()).toEqual([]);
    });
  });

  describe('discard', () => {
    it('removes the token and queues deletion of its cookie', () => {
      const ctx = new RequestContext([cookieFor(3, 7)]);

      expect(store.discard(ctx, asStudyRunId(7))?.slot).toBe(3);

      expect(store.find(ctx, asStudyRunId(7))).toBeNull();
      expect(ctx.pendingCookieMutations()).toEqual([{ kind: 'delete', name: 'STUDY_RUN_IDS_3', path: '/' }]);
    });

    it('is a no-op for a run without a token', () => {
      const ctx = new RequestContext([cookieFor(3, 7)]);
      expect(store.discard(ctx, asStudyRunId(8))).toBeNull();
      expect(ctx.pendingCookieMutations()).toEqual([]);
    });

    it('lets the last mutation of a cookie win', () => {
      const ctx = new RequestContext([]);
      store.write(ctx, token(0, 7));
      store.discard(ctx, asStudyRunId(7));
      expect(ctx.pendingCookieMutations()).toEqual([{ kind: 'delete', name: 'STUDY_RUN_IDS_0', path: '/' }]);
    });
  });
});
