import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';
import {
  asBatchId,
  asComponentId,
  asComponentRunId,
  asEpochMs,
  asGroupRunId,
  asStudyId,
  asStudyRunId,
  asWorkerId,
} from '../domain/ids.js';
import { WORKER_KINDS } from '../domain/worker.js';
import type { TokenMalformedError } from './errors.js';
import { parseTokenSlot, type SessionToken, type TokenSlot } from './session-token.js';

export const FIELD_SEPARATOR = '&';
export const KEY_VALUE_SEPARATOR = '=';
/** Written for absent optional values; read back as absent. */
export const NULL_MARKER = 'null';

/**
 * Wire keys, in the canonical order `encode` writes them.
 * Locked: browsers in the field hold cookies with exactly these keys.
 */
export const WIRE_KEYS = [
  'batchId',
  'componentId',
  'componentPosition',
  'componentResultId',
  'creationTime',
  'groupResultId',
  'studyId',
  'studyResultId',
  'workerId',
  'workerType',
] as const;

export type WireKey = (typeof WIRE_KEYS)[number];

const IntegerString = z
  .string()
  .regex(/^[+-]?\d+$/, 'not an integer')
  .transform(Number)
  .refine(Number.isSafeInteger, 'integer out of range');

// Absent or the null marker decode as absent; anything else must be an integer.
const OptionalIntegerString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v === NULL_MARKER ? undefined : v))
  .pipe(IntegerString.optional())
  .transform((v) => v ?? null);

const TokenFieldsSchema = z.object({
  batchId: IntegerString.transform(asBatchId),
  componentId: OptionalIntegerString.transform((v) => (v === null ? null : asComponentId(v))),
  componentPosition: OptionalIntegerString,
  componentResultId: OptionalIntegerString.transform((v) => (v === null ? null : asComponentRunId(v))),
  creationTime: IntegerString.transform(asEpochMs),
  groupResultId: OptionalIntegerString.transform((v) => (v === null ? null : asGroupRunId(v))),
  studyId: IntegerString.transform(asStudyId),
  studyResultId: IntegerString.transform(asStudyRunId),
  workerId: IntegerString.transform(asWorkerId),
  workerType: z.enum(WORKER_KINDS),
});

/**
 * Session-token cookie codec.
 *
 * Cookie name: `<base>_<slot>`, slot a single decimal digit.
 * Cookie value: `key=value` pairs joined by `&`, e.g.
 *   batchId=3&componentId=null&...&workerId=12&workerType=GeneralMultiple
 */
export class SessionTokenCodec {
  readonly cookiePrefix: string;

  constructor(cookieBase: string) {
    this.cookiePrefix = `${cookieBase}_`;
  }

  cookieNameFor(slot: TokenSlot): string {
    return `${this.cookiePrefix}${slot}`;
  }

  isTokenCookieName(name: string): boolean {
    return name.startsWith(this.cookiePrefix);
  }

  encode(token: SessionToken): string {
    const values: Record<WireKey, string | number | null> = {
      batchId: token.batchId,
      componentId: token.componentId,
      componentPosition: token.componentPosition,
      componentResultId: token.componentRunId,
      creationTime: token.creationTime,
      groupResultId: token.groupRunId,
      studyId: token.studyId,
      studyResultId: token.studyRunId,
      workerId: token.workerId,
      workerType: token.workerKind,
    };
    return WIRE_KEYS.map((key) => `${key}${KEY_VALUE_SEPARATOR}${values[key] ?? NULL_MARKER}`).join(FIELD_SEPARATOR);
  }

  decode(cookieName: string, cookieValue: string): Result<SessionToken, TokenMalformedError> {
    const slot = this.slotFromName(cookieName);
    if (slot === null) {
      return err(malformed(cookieName, 'name', `Cookie name must be ${this.cookiePrefix}<digit>`));
    }

    const pairs = splitPairs(cookieValue);
    if (pairs.kind === 'invalid') {
      return err(malformed(cookieName, 'pair', `Expected key=value, got "${pairs.pair}"`));
    }

    const parsed = TokenFieldsSchema.safeParse(pairs.entries);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue && issue.path.length > 0 ? String(issue.path[0]) : 'value';
      return err(malformed(cookieName, field, `Couldn't extract ${field}: ${issue?.message ?? 'invalid'}`));
    }

    const f = parsed.data;
    return ok({
      slot,
      workerId: f.workerId,
      workerKind: f.workerType,
      batchId: f.batchId,
      studyId: f.studyId,
      studyRunId: f.studyResultId,
      componentId: f.componentId,
      componentRunId: f.componentResultId,
      componentPosition: f.componentPosition,
      groupRunId: f.groupResultId,
      creationTime: f.creationTime,
    });
  }

  private slotFromName(cookieName: string): TokenSlot | null {
    if (!this.isTokenCookieName(cookieName)) return null;
    const suffix = cookieName.slice(this.cookiePrefix.length);
    if (!/^\d$/.test(suffix)) return null;
    return parseTokenSlot(Number(suffix));
  }
}

type SplitPairs =
  | { readonly kind: 'ok'; readonly entries: Readonly<Record<string, string>> }
  | { readonly kind: 'invalid'; readonly pair: string };

// A repeated key keeps its last value; unknown keys are ignored by the schema.
function splitPairs(value: string): SplitPairs {
  const entries = new Map<string, string>();
  for (const pair of value.split(FIELD_SEPARATOR)) {
    const at = pair.indexOf(KEY_VALUE_SEPARATOR);
    if (at <= 0) return { kind: 'invalid', pair };
    entries.set(pair.slice(0, at), pair.slice(at + 1));
  }
  return { kind: 'ok', entries: Object.fromEntries(entries) };
}

function malformed(cookieName: string, field: string, detail: string): TokenMalformedError {
  return {
    code: 'TOKEN_MALFORMED',
    message: `Malformed session token "${cookieName}": ${detail}`,
    cookieName,
    field,
  };
}
