import { readFile } from 'node:fs/promises';
import { ResultAsync, err, ok, type Result } from 'neverthrow';
import { z } from 'zod';
import { toConfigIssues } from '../config/app-config.js';
import type { AppError, ConfigInvalidError, ConfigIssue } from '../errors/app-error.js';
import { assertNever } from '../runtime/assert-never.js';
import { Err } from '../errors/factories.js';
import { asBatchId, asComponentId, asStudyId, asWorkerId } from '../domain/ids.js';
import type { Batch, Study } from '../domain/study.js';
import { WORKER_KINDS, type Worker } from '../domain/worker.js';

/**
 * Studies, batches and workers a deployment starts with.
 *
 * File layout (JSON):
 *   {
 *     "studies": [{ "id": 1, "title": "...", "components": [{ "id": 10, "title": "...", "reloadable": true }] }],
 *     "batches": [{ "id": 1, "studyId": 1, "title": "Default", "allowedWorkerKinds": ["GeneralMultiple"] }],
 *     "workers": [{ "id": 1, "kind": "GeneralMultiple" }]
 *   }
 */
export interface Catalog {
  readonly studies: readonly Study[];
  readonly batches: readonly Batch[];
  readonly workers: readonly Worker[];
}

export const EMPTY_CATALOG: Catalog = { studies: [], batches: [], workers: [] };

const RecordId = z.number().int().positive();

const ComponentSchema = z.object({
  id: RecordId,
  title: z.string(),
  active: z.boolean().default(true),
  reloadable: z.boolean().default(false),
});

const StudySchema = z.object({
  id: RecordId,
  title: z.string(),
  components: z.array(ComponentSchema),
});

const BatchSchema = z.object({
  id: RecordId,
  studyId: RecordId,
  title: z.string(),
  active: z.boolean().default(true),
  allowedWorkerKinds: z.array(z.enum(WORKER_KINDS)),
  maxTotalWorkers: z.number().int().positive().nullable().default(null),
});

const WorkerSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('Author'), id: RecordId, username: z.string().min(1) }),
  z.object({
    kind: z.enum(['PersonalSingle', 'PersonalMultiple']),
    id: RecordId,
    comment: z.string().nullable().default(null),
  }),
  z.object({ kind: z.enum(['GeneralSingle', 'GeneralMultiple']), id: RecordId }),
  z.object({ kind: z.enum(['MTurk', 'MTurkSandbox']), id: RecordId, mturkWorkerId: z.string().min(1) }),
]);

const CatalogSchema = z.object({
  studies: z.array(StudySchema).default([]),
  batches: z.array(BatchSchema).default([]),
  workers: z.array(WorkerSchema).default([]),
});

type ParsedCatalog = z.infer<typeof CatalogSchema>;

/**
 * Validates a decoded catalog. Besides the shape, every batch must point at a
 * listed study and ids must be unique per entity.
 */
export function parseCatalog(source: string, raw: unknown): Result<Catalog, ConfigInvalidError> {
  const parsed = CatalogSchema.safeParse(raw);
  if (!parsed.success) return err(Err.configInvalid(source, toConfigIssues(parsed.error)));

  const issues = referenceIssues(parsed.data);
  if (issues.length > 0) return err(Err.configInvalid(source, issues));

  return ok(buildCatalog(parsed.data));
}

export function loadCatalogFile(filePath: string): ResultAsync<Catalog, AppError> {
  return ResultAsync.fromPromise(readFile(filePath, 'utf-8'), (cause): AppError =>
    Err.startupFailed('catalog', `Couldn't read catalog file ${filePath}`, cause)
  ).andThen((text) => {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (cause) {
      return err(Err.startupFailed('catalog', `Catalog file ${filePath} is not valid JSON`, cause));
    }
    return parseCatalog(filePath, raw);
  });
}

function referenceIssues(catalog: ParsedCatalog): readonly ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  const studyIds = new Set(catalog.studies.map((s) => s.id));

  catalog.batches.forEach((batch, i) => {
    if (!studyIds.has(batch.studyId)) {
      issues.push({ path: `batches.${i}.studyId`, message: `Unknown study ${batch.studyId}` });
    }
  });

  const duplicates = (path: string, ids: readonly number[]) => {
    const seen = new Set<number>();
    ids.forEach((id, i) => {
      if (seen.has(id)) issues.push({ path: `${path}.${i}.id`, message: `Duplicate id ${id}` });
      seen.add(id);
    });
  };
  duplicates('studies', catalog.studies.map((s) => s.id));
  duplicates('batches', catalog.batches.map((b) => b.id));
  duplicates('workers', catalog.workers.map((w) => w.id));
  catalog.studies.forEach((s, i) => duplicates(`studies.${i}.components`, s.components.map((c) => c.id)));

  return issues;
}

function buildCatalog(parsed: ParsedCatalog): Catalog {
  return {
    studies: parsed.studies.map((s) => {
      const studyId = asStudyId(s.id);
      return {
        id: studyId,
        title: s.title,
        components: s.components.map((c) => ({
          id: asComponentId(c.id),
          studyId,
          title: c.title,
          active: c.active,
          reloadable: c.reloadable,
        })),
      };
    }),
    batches: parsed.batches.map((b) => ({
      id: asBatchId(b.id),
      studyId: asStudyId(b.studyId),
      title: b.title,
      active: b.active,
      allowedWorkerKinds: b.allowedWorkerKinds,
      maxTotalWorkers: b.maxTotalWorkers,
    })),
    workers: parsed.workers.map(toWorker),
  };
}

function toWorker(w: ParsedCatalog['workers'][number]): Worker {
  switch (w.kind) {
    case 'Author':
      return { kind: w.kind, id: asWorkerId(w.id), username: w.username };
    case 'PersonalSingle':
    case 'PersonalMultiple':
      return { kind: w.kind, id: asWorkerId(w.id), comment: w.comment };
    case 'GeneralSingle':
    case 'GeneralMultiple':
      return { kind: w.kind, id: asWorkerId(w.id) };
    case 'MTurk':
    case 'MTurkSandbox':
      return { kind: w.kind, id: asWorkerId(w.id), mturkWorkerId: w.mturkWorkerId };
    default:
      return assertNever(w);
  }
}
