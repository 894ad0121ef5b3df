import type { BatchId, ComponentId, StudyId } from './ids.js';
import type { WorkerKind } from './worker.js';

export interface Component {
  readonly id: ComponentId;
  readonly studyId: StudyId;
  readonly title: string;
  readonly active: boolean;
  /** A reloadable component may be started again within the same run; its previous run is dropped. */
  readonly reloadable: boolean;
}

export interface Study {
  readonly id: StudyId;
  readonly title: string;
  /** Execution order */
  readonly components: readonly Component[];
}

export interface Batch {
  readonly id: BatchId;
  readonly studyId: StudyId;
  readonly title: string;
  readonly active: boolean;
  readonly allowedWorkerKinds: readonly WorkerKind[];
  /** null: no limit */
  readonly maxTotalWorkers: number | null;
}

/**
 * 1-based position of the component in the study, or null if it is not part of it.
 */
export function componentPosition(study: Study, componentId: ComponentId): number | null {
  const index = study.components.findIndex((c) => c.id === componentId);
  return index < 0 ? null : index + 1;
}
