/**
 * In-memory state store.
 *
 * State lives as long as the instance. Useful when a single process embeds
 * Cronark and in tests.
 *
 * @packageDocumentation
 */

import type { StateStore, StoredValue, WorkerName } from '../types.js';

export class MemoryStore implements StateStore {
  private readonly scopes: Map<string, Map<string, StoredValue>> = new Map();

  get(key: string, worker?: WorkerName | null): StoredValue | null {
    return this.scopes.get(scopeOf(worker))?.get(key) ?? null;
  }

  set(key: string, value: StoredValue | null, worker?: WorkerName | null): boolean {
    const scope = scopeOf(worker);

    if (value === null) {
      this.scopes.get(scope)?.delete(key);
      return true;
    }

    const entries = this.scopes.get(scope) ?? new Map<string, StoredValue>();
    entries.set(key, value);
    this.scopes.set(scope, entries);
    return true;
  }

  clear(worker?: WorkerName | null): boolean {
    this.scopes.delete(scopeOf(worker));
    return true;
  }
}

// Keeps the global scope apart from every worker name
function scopeOf(worker?: WorkerName | null): string {
  return worker === undefined || worker === null ? 'global' : `worker:${worker}`;
}
