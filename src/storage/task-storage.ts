import type { Task } from '../schema/index.js';
import type { StorageReadError, StorageWriteError } from './errors.js';

export type SaveResult = { ok: true } | { ok: false; error: StorageWriteError };

/**
 * Persistence for the full task collection, completed and deleted tasks included.
 */
export interface TaskStorage {
  /** All stored tasks in stored order; an empty array when nothing can be read. */
  load(): Task[];
  /** Overwrite the stored collection. */
  save(tasks: readonly Task[]): SaveResult;
  /** Why the most recent load came back empty, when the backend can tell. */
  readonly lastLoadError?: StorageReadError | null;
}
