/**
 * Cronark Worker State
 *
 * Worker-scoped access to the persisted jobs hash, job index and pid.
 *
 * @packageDocumentation
 */

import type { Pid, StateStore, WorkerName } from '../types.js';
import type { JobRegistry } from './registry.js';
import { STATE_KEYS } from '../constants.js';

/**
 * Façade over a {@link StateStore} that knows when the stored index is stale.
 */
export class WorkerState {
  constructor(
    private readonly store: StateStore,
    private readonly registry: JobRegistry
  ) {}

  getSavedHash(worker: WorkerName): string | null {
    const hash = this.store.get(STATE_KEYS.jobsHash, worker);
    return typeof hash === 'string' ? hash : null;
  }

  saveHash(hash: string | null, worker: WorkerName): boolean {
    return this.store.set(STATE_KEYS.jobsHash, hash, worker);
  }

  /**
   * Whether the live job list differs from the one the stored index refers to.
   */
  hashChanged(worker: WorkerName): boolean {
    return this.registry.hash(worker) !== this.getSavedHash(worker);
  }

  /**
   * Stored index, or null when there are no jobs, the hash changed, nothing
   * was stored, or the index no longer names a job.
   */
  getCurrentIndex(worker: WorkerName): number | null {
    if (!this.registry.hasAny(worker) || this.hashChanged(worker)) {
      return null;
    }

    const index = this.store.get(STATE_KEYS.currentJobIndex, worker);
    if (typeof index !== 'number' || !this.registry.has(index, worker)) {
      return null;
    }

    return index;
  }

  setCurrentIndex(index: number | null, worker: WorkerName): boolean {
    return this.store.set(STATE_KEYS.currentJobIndex, index, worker);
  }

  /**
   * Stored owner pid. Numeric strings are accepted; zero reads as unset.
   */
  getPid(worker: WorkerName): Pid | null {
    const pid = this.store.get(STATE_KEYS.pid, worker);

    if (typeof pid === 'number' && Number.isInteger(pid) && pid > 0) {
      return pid;
    }
    if (typeof pid === 'string' && /^\d+$/.test(pid)) {
      const parsed = parseInt(pid, 10);
      return parsed > 0 ? parsed : null;
    }

    return null;
  }

  setPid(pid: Pid | null, worker: WorkerName): boolean {
    return this.store.set(STATE_KEYS.pid, pid, worker);
  }

  /**
   * Drop everything stored for a worker.
   */
  clear(worker: WorkerName): boolean {
    return this.store.clear(worker);
  }
}
