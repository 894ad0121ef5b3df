import { okAsync, type ResultAsync } from 'neverthrow';
import type { WorkerId } from '../domain/ids.js';
import type { Worker } from '../domain/worker.js';
import type { WorkerDirectoryError, WorkerDirectoryPort } from '../ports/worker-directory.port.js';

export class InMemoryWorkerDirectory implements WorkerDirectoryPort {
  private readonly workers: ReadonlyMap<WorkerId, Worker>;

  constructor(workers: readonly Worker[]) {
    this.workers = new Map(workers.map((w) => [w.id, w]));
  }

  findWorker(id: WorkerId): ResultAsync<Worker | null, WorkerDirectoryError> {
    return okAsync(this.workers.get(id) ?? null);
  }
}
