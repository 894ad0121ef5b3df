import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  asBatchId,
  asComponentId,
  asComponentRunId,
  asEpochMs,
  asGroupRunId,
  asStudyId,
  asStudyRunId,
  asWorkerId,
} from '../../src/domain/ids.js';
import { WORKER_KINDS } from '../../src/domain/worker.js';
import { SessionTokenCodec } from '../../src/session-token/session-token-codec.js';
import type { SessionToken } from '../../src/session-token/session-token.js';
import { expectErr, expectOk } from '../helpers/result-helpers.js';
import { slot, token } from '../fakes/token.fixtures.js';

const codec = new SessionTokenCodec('STUDY_RUN_IDS');

const WELL_FORMED =
  'batchId=3&componentId=11&componentPosition=1&componentResultId=70&creationTime=1700000000000' +
  '&groupResultId=null&studyId=1&studyResultId=7&workerId=104&workerType=GeneralMultiple';

describe('SessionTokenCodec', () => {
  describe('cookie names', () => {
    it('appends the slot to the base', () => {
      expect(codec.cookieNameFor(slot(0))).toBe('STUDY_RUN_IDS_0');
      expect(codec.cookieNameFor(slot(9))).toBe('STUDY_RUN_IDS_9');
    });

    it('recognises names by prefix only', () => {
      expect(codec.isTokenCookieName('STUDY_RUN_IDS_3')).toBe(true);
      expect(codec.isTokenCookieName('STUDY_RUN_IDS_x')).toBe(true);
      expect(codec.isTokenCookieName('STUDY_RUN_IDS')).toBe(false);
      expect(codec.isTokenCookieName('OTHER_3')).toBe(false);
    });
  });

  describe('encode', () => {
    it('writes all ten keys in canonical order with null for absent values', () => {
      const encoded = codec.encode(
        token(0, 7, { batchId: asBatchId(3), componentRunId: asComponentRunId(70) })
      );
      expect(encoded).toBe(WELL_FORMED);
    });

    it('writes null for every absent component field', () => {
      const encoded = codec.encode(
        token(2, 5, { componentId: null, componentRunId: null, componentPosition: null })
      );
      expect(encoded).toBe(
        'batchId=1&componentId=null&componentPosition=null&componentResultId=null&creationTime=1700000000000' +
          '&groupResultId=null&studyId=1&studyResultId=5&workerId=104&workerType=GeneralMultiple'
      );
    });
  });

  describe('decode', () => {
    it('decodes a well-formed cookie, taking the slot from the name', () => {
      const decoded = expectOk(codec.decode('STUDY_RUN_IDS_4', WELL_FORMED), 'decoding');
      expect(decoded).toEqual({
        slot: slot(4),
        workerId: asWorkerId(104),
        workerKind: 'GeneralMultiple',
        batchId: asBatchId(3),
        studyId: asStudyId(1),
        studyRunId: asStudyRunId(7),
        componentId: asComponentId(11),
        componentRunId: asComponentRunId(70),
        componentPosition: 1,
        groupRunId: null,
        creationTime: asEpochMs(1_700_000_000_000),
      });
    });

    it('accepts keys in any order and ignores unknown keys', () => {
      const value =
        'workerType=MTurk&workerId=5&studyResultId=9&studyId=2&creationTime=10&batchId=4&extra=whatever';
      const decoded = expectOk(codec.decode('STUDY_RUN_IDS_1', value), 'decoding');
      expect(decoded.workerKind).toBe('MTurk');
      expect(decoded.studyRunId).toBe(9);
      expect(decoded.componentId).toBeNull();
      expect(decoded.componentPosition).toBeNull();
      expect(decoded.groupRunId).toBeNull();
    });

    it('keeps the last value of a repeated key', () => {
      const decoded = expectOk(codec.decode('STUDY_RUN_IDS_0', `${WELL_FORMED}&workerId=200`), 'decoding');
      expect(decoded.workerId).toBe(200);
    });

    it('splits each pair at its first "="', () => {
      const error = expectErr(
        codec.decode('STUDY_RUN_IDS_0', WELL_FORMED.replace('studyId=1', 'studyId=1=2')),
        'decoding'
      );
      expect(error.field).toBe('studyId');
    });

    it('reads optional group run ids', () => {
      const decoded = expectOk(
        codec.decode('STUDY_RUN_IDS_0', WELL_FORMED.replace('groupResultId=null', 'groupResultId=33')),
        'decoding'
      );
      expect(decoded.groupRunId).toBe(asGroupRunId(33));
    });

    it.each([
      ['studyResultId'],
      ['workerId'],
      ['workerType'],
      ['batchId'],
      ['studyId'],
      ['creationTime'],
    ])('rejects a cookie missing %s', (key) => {
      const value = WELL_FORMED.split('&')
        .filter((pair) => !pair.startsWith(`${key}=`))
        .join('&');
      const error = expectErr(codec.decode('STUDY_RUN_IDS_0', value), 'decoding');
      expect(error).toMatchObject({ code: 'TOKEN_MALFORMED', cookieName: 'STUDY_RUN_IDS_0', field: key });
    });

    it('rejects the null marker in a required field', () => {
      const error = expectErr(
        codec.decode('STUDY_RUN_IDS_0', WELL_FORMED.replace('studyResultId=7', 'studyResultId=null')),
        'decoding'
      );
      expect(error.field).toBe('studyResultId');
    });

    it.each([
      ['studyId=abc', 'studyId'],
      ['studyId=1.5', 'studyId'],
      ['studyId=', 'studyId'],
      ['studyId=99999999999999999999', 'studyId'],
      ['componentPosition=first', 'componentPosition'],
    ])('rejects non-integer value %s', (replacement, field) => {
      const key = replacement.slice(0, replacement.indexOf('='));
      const original = WELL_FORMED.split('&').find((pair) => pair.startsWith(`${key}=`)) ?? '';
      const error = expectErr(codec.decode('STUDY_RUN_IDS_0', WELL_FORMED.replace(original, replacement)), 'decoding');
      expect(error.field).toBe(field);
    });

    it('rejects an unknown worker type', () => {
      const error = expectErr(
        codec.decode('STUDY_RUN_IDS_0', WELL_FORMED.replace('workerType=GeneralMultiple', 'workerType=Robot')),
        'decoding'
      );
      expect(error.field).toBe('workerType');
    });

    it('rejects a pair without "="', () => {
      const error = expectErr(codec.decode('STUDY_RUN_IDS_0', `${WELL_FORMED}&garbage`), 'decoding');
      expect(error.field).toBe('pair');
      expect(error.message).toBe('Malformed session token "STUDY_RUN_IDS_0": Expected key=value, got "garbage"');
    });

    it('rejects an empty value', () => {
      expect(expectErr(codec.decode('STUDY_RUN_IDS_0', ''), 'decoding').field).toBe('pair');
    });

    it.each([['STUDY_RUN_IDS_'], ['STUDY_RUN_IDS_10'], ['STUDY_RUN_IDS_a'], ['OTHER_1']])(
      'rejects cookie name %s',
      (name) => {
        const error = expectErr(codec.decode(name, WELL_FORMED), 'decoding');
        expect(error).toMatchObject({ code: 'TOKEN_MALFORMED', cookieName: name, field: 'name' });
      }
    );
  });

  describe('round trip', () => {
    const optionalId = fc.option(fc.integer({ min: 1, max: Number.MAX_SAFE_INTEGER }), { nil: null });
    const id = fc.integer({ min: 1, max: Number.MAX_SAFE_INTEGER });

    const arbitraryToken: fc.Arbitrary<SessionToken> = fc.record({
      slot: fc.integer({ min: 0, max: 9 }).map(slot),
      workerId: id.map(asWorkerId),
      workerKind: fc.constantFrom(...WORKER_KINDS),
      batchId: id.map(asBatchId),
      studyId: id.map(asStudyId),
      studyRunId: id.map(asStudyRunId),
      componentId: optionalId.map((v) => (v === null ? null : asComponentId(v))),
      componentRunId: optionalId.map((v) => (v === null ? null : asComponentRunId(v))),
      componentPosition: fc.option(fc.integer({ min: 1, max: 500 }), { nil: null }),
      groupRunId: optionalId.map((v) => (v === null ? null : asGroupRunId(v))),
      creationTime: fc.integer({ min: 0, max: 4_102_444_800_000 }).map(asEpochMs),
    });

    it('decode(name(t), encode(t)) returns t', () => {
      fc.assert(
        fc.property(arbitraryToken, (t) => {
          const decoded = codec.decode(codec.cookieNameFor(t.slot), codec.encode(t));
          expect(decoded.isOk() && decoded.value).toEqual(t);
        })
      );
    });
  });
});
