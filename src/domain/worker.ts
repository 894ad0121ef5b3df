import type { WorkerId } from './ids.js';

/**
 * Worker kinds. The tag doubles as the `workerType` value in session tokens.
 */
export const WORKER_KINDS = [
  'Author',
  'PersonalSingle',
  'PersonalMultiple',
  'GeneralSingle',
  'GeneralMultiple',
  'MTurk',
  'MTurkSandbox',
] as const;

export type WorkerKind = (typeof WORKER_KINDS)[number];

/** A study author trying out their own study. */
export interface AuthorWorker {
  readonly kind: 'Author';
  readonly id: WorkerId;
  readonly username: string;
}

/** Personal link handed to one known participant. */
export interface PersonalWorker {
  readonly kind: 'PersonalSingle' | 'PersonalMultiple';
  readonly id: WorkerId;
  readonly comment: string | null;
}

/** Anonymous public link; a worker record per browser. */
export interface GeneralWorker {
  readonly kind: 'GeneralSingle' | 'GeneralMultiple';
  readonly id: WorkerId;
}

/** Mechanical Turk assignment (live or sandbox). */
export interface MTurkWorker {
  readonly kind: 'MTurk' | 'MTurkSandbox';
  readonly id: WorkerId;
  readonly mturkWorkerId: string;
}

export type Worker = AuthorWorker | PersonalWorker | GeneralWorker | MTurkWorker;
