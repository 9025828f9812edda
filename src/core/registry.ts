/**
 * Cronark Job Registry
 *
 * In-memory, ordered job lists per worker and the catalog resolving job types
 * to their classes.
 *
 * @packageDocumentation
 */

import { createHash } from 'node:crypto';
import type { JobConstructor, JobType, WorkerName } from '../types.js';
import { DEFAULT_WORKER } from '../constants.js';
import { CronarkError } from '../errors.js';

// =============================================================================
// Job Registry
// =============================================================================

/**
 * Ordered job-type lists keyed by worker.
 *
 * Duplicates are allowed and order is execution order. Nothing here is
 * persisted; only its hash is.
 */
export class JobRegistry {
  private readonly entries: Map<WorkerName, JobType[]> = new Map();

  /**
   * Register a worker with an empty job list. No-op when it exists.
   */
  register(worker: WorkerName): void {
    if (!this.entries.has(worker)) {
      this.entries.set(worker, []);
    }
  }

  /**
   * Insert a job type at a 0-based position.
   *
   * A negative or out-of-range position appends.
   */
  add(jobType: JobType, worker: WorkerName = DEFAULT_WORKER, position = -1): void {
    this.register(worker);
    const jobs = this.entries.get(worker) ?? [];

    if (position < 0 || position >= jobs.length) {
      jobs.push(jobType);
    } else {
      jobs.splice(position, 0, jobType);
    }

    this.entries.set(worker, jobs);
  }

  /**
   * Job type at a position, null for an unknown worker or position.
   */
  get(position: number, worker: WorkerName = DEFAULT_WORKER): JobType | null {
    return this.entries.get(worker)?.[position] ?? null;
  }

  has(position: number, worker: WorkerName = DEFAULT_WORKER): boolean {
    const jobs = this.entries.get(worker);
    return jobs !== undefined && Number.isInteger(position) && position >= 0 && position < jobs.length;
  }

  isRegistered(worker: WorkerName): boolean {
    return this.entries.has(worker);
  }

  /**
   * Job count of one worker, or of every worker when omitted.
   */
  count(worker?: WorkerName | null): number {
    if (worker === undefined || worker === null) {
      let total = 0;
      for (const jobs of this.entries.values()) {
        total += jobs.length;
      }
      return total;
    }

    return this.entries.get(worker)?.length ?? 0;
  }

  hasAny(worker?: WorkerName | null): boolean {
    return this.count(worker) > 0;
  }

  /**
   * Content hash of one worker's list, or of the whole registry when omitted.
   *
   * The aggregate groups lists by worker, sorted by name, so it does not
   * depend on registration order.
   */
  hash(worker?: WorkerName | null): string {
    if (worker === undefined || worker === null) {
      const grouped = [...this.entries.keys()]
        .sort()
        .map((name) => [name, this.jobs(name)]);
      return md5(JSON.stringify(grouped));
    }

    return md5(JSON.stringify(this.jobs(worker)));
  }

  workers(): WorkerName[] {
    return [...this.entries.keys()];
  }

  /**
   * Copy of a worker's job list.
   */
  jobs(worker: WorkerName): JobType[] {
    return [...(this.entries.get(worker) ?? [])];
  }
}

function md5(input: string): string {
  return createHash('md5').update(input).digest('hex');
}

// =============================================================================
// Job Catalog
// =============================================================================

/**
 * Maps job types to the classes that implement them.
 */
export class JobCatalog {
  private readonly classes: Map<JobType, JobConstructor> = new Map();

  /**
   * Define the class behind a job type.
   *
   * @throws CronarkError if the type is already bound to another class
   */
  define(jobType: JobType, jobClass: JobConstructor): void {
    const existing = this.classes.get(jobType);
    if (existing !== undefined && existing !== jobClass) {
      throw new CronarkError(`Job type '${jobType}' is already defined by another class`);
    }
    this.classes.set(jobType, jobClass);
  }

  /**
   * Define a class under its own name and return that name.
   */
  defineClass(jobClass: JobConstructor): JobType {
    const jobType = jobTypeOf(jobClass);
    this.define(jobType, jobClass);
    return jobType;
  }

  resolve(jobType: JobType): JobConstructor | null {
    return this.classes.get(jobType) ?? null;
  }

  has(jobType: JobType): boolean {
    return this.classes.has(jobType);
  }
}

/**
 * Catalog identifier of a job class: its static `jobName`, else its name.
 */
export function jobTypeOf(jobClass: JobConstructor): JobType {
  const name = jobClass.jobName ?? jobClass.name;
  if (!name) {
    throw new TypeError('Anonymous job classes need a static jobName');
  }
  return name;
}
