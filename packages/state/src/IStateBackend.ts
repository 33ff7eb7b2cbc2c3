import type { LockInfo } from '@stratum/contracts';

import type { IState } from './IState';

/**
 * Interface for state backend implementations.
 * Enables support for different storage backends (local file, in-memory, ...)
 */
export interface IStateBackend {
  /**
   * Read the current state. Returns an empty state when none has been written yet.
   */
  read(): Promise<IState>;

  /**
   * Replace the stored state. Must be atomic: readers see the old or the new state, never a mix.
   */
  write(state: IState): Promise<void>;

  /**
   * Acquire the single-writer lock. Throws StateLockedError if someone else holds it.
   */
  lock(info: LockInfo): Promise<void>;

  /**
   * Release the lock taken with `id`. Releasing a lock that is not held is a no-op.
   */
  unlock(id: string): Promise<void>;

  /**
   * Remove the lock whoever holds it. For recovery after a crashed run.
   */
  forceUnlock(): Promise<void>;

  /**
   * Information about the current lock holder, if any
   */
  getLock(): Promise<LockInfo | null>;
}
