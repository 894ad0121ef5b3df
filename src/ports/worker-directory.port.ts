import type { ResultAsync } from 'neverthrow';
import type { WorkerId } from '../domain/ids.js';
import type { Worker } from '../domain/worker.js';

export type WorkerDirectoryError = { readonly code: 'WORKER_DIRECTORY_UNAVAILABLE'; readonly message: string };

/**
 * Lookup of worker records minted elsewhere (identity providers, recruiting platforms).
 */
export interface WorkerDirectoryPort {
  findWorker(id: WorkerId): ResultAsync<Worker | null, WorkerDirectoryError>;
}
