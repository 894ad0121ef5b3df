import type { ResultAsync } from 'neverthrow';
import type { BatchId, StudyId } from '../domain/ids.js';
import type { Batch, Study } from '../domain/study.js';

export type StudyCatalogError = { readonly code: 'CATALOG_UNAVAILABLE'; readonly message: string };

/**
 * Read-only view of authored studies and their batches.
 * Absence is a value (null), not an error.
 */
export interface StudyCatalogPort {
  findStudy(id: StudyId): ResultAsync<Study | null, StudyCatalogError>;

  findBatch(id: BatchId): ResultAsync<Batch | null, StudyCatalogError>;

  /** The study's default batch: the first one created for it. */
  findDefaultBatch(studyId: StudyId): ResultAsync<Batch | null, StudyCatalogError>;
}
