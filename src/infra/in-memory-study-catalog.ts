import { okAsync, type ResultAsync } from 'neverthrow';
import type { BatchId, StudyId } from '../domain/ids.js';
import type { Batch, Study } from '../domain/study.js';
import type { StudyCatalogError, StudyCatalogPort } from '../ports/study-catalog.port.js';

export class InMemoryStudyCatalog implements StudyCatalogPort {
  private readonly studies: ReadonlyMap<StudyId, Study>;
  private readonly batches: readonly Batch[];

  /** Batches in creation order; a study's first batch is its default. */
  constructor(studies: readonly Study[], batches: readonly Batch[]) {
    this.studies = new Map(studies.map((s) => [s.id, s]));
    this.batches = batches;
  }

  findStudy(id: StudyId): ResultAsync<Study | null, StudyCatalogError> {
    return okAsync(this.studies.get(id) ?? null);
  }

  findBatch(id: BatchId): ResultAsync<Batch | null, StudyCatalogError> {
    return okAsync(this.batches.find((b) => b.id === id) ?? null);
  }

  findDefaultBatch(studyId: StudyId): ResultAsync<Batch | null, StudyCatalogError> {
    return okAsync(this.batches.find((b) => b.studyId === studyId) ?? null);
  }
}
