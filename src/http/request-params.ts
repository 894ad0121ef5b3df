import { z } from 'zod';
import { asBatchId, asComponentId, asStudyId, asStudyRunId, asWorkerId } from '../domain/ids.js';

const RecordId = z
  .string({ required_error: 'is required' })
  .regex(/^\d+$/, 'must be a positive integer')
  .transform(Number)
  .refine((n) => Number.isSafeInteger(n) && n > 0, 'must be a positive integer');

const Flag = z
  .enum(['true', 'false'])
  .optional()
  .transform((v) => v !== 'false');

const OptionalText = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.length === 0 ? null : v));

export const StartStudyRunQuery = z.object({
  studyId: RecordId.transform(asStudyId),
  batchId: RecordId.transform(asBatchId).optional().transform((v) => v ?? null),
  workerId: RecordId.transform(asWorkerId),
  assignmentId: OptionalText,
});

export const RunQuery = z.object({
  studyId: RecordId.transform(asStudyId),
  srid: RecordId.transform(asStudyRunId),
});

export const ComponentQuery = RunQuery.extend({
  componentId: RecordId.transform(asComponentId),
});

export const FinishComponentQuery = ComponentQuery.extend({
  successful: Flag,
});

export const FinishStudyQuery = RunQuery.extend({
  successful: Flag,
  errorMsg: OptionalText,
});

export const AbortStudyQuery = RunQuery.extend({
  message: OptionalText,
});

/** First zod issue as `field: message`. */
export function describeInvalidRequest(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'Invalid request';
  const field = issue.path.length > 0 ? issue.path.join('.') : 'request';
  return `${field} ${issue.message}`;
}
