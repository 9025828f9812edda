/**
 * Cronark Scheduler
 *
 * Runs one worker's jobs in circular order for as long as this process owns
 * the worker.
 *
 * @packageDocumentation
 */

import type {
  CronarkHooks,
  JobConstructor,
  JobType,
  Pid,
  ProcessMonitor,
  StateStore,
  WorkerName,
} from '../types.js';
import { DEFAULT_DELAY_MS, DEFAULT_WORKER, PRODUCT_NAME, STATE_KEYS } from '../constants.js';
import { StateStoreError, toError } from '../errors.js';
import { NodeProcessMonitor } from '../process/monitor.js';
import { JobCatalog, JobRegistry } from './registry.js';
import { WorkerState } from './worker-state.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration for a Cronark instance
 */
export interface CronarkConfig {
  /** Where the jobs hash, job index and pid are persisted */
  store: StateStore;
  /** OS process primitives (defaults to the running Node.js process) */
  monitor?: ProcessMonitor;
  /** Delay between two jobs in milliseconds */
  delay?: number;
  /** Write diagnostics to the console (defaults to stdout being a TTY) */
  diagnostics?: boolean;
  /** Lifecycle callbacks */
  hooks?: CronarkHooks;
}

// =============================================================================
// Cronark
// =============================================================================

/**
 * Background job runner for cron-triggered workers.
 *
 * Each call to {@link Cronark.start} claims the worker for the current
 * process, then executes the worker's jobs one after another, wrapping back
 * to the first job after the last. The loop ends when another process
 * overwrites the stored pid or the job list can no longer be resolved.
 *
 * @example
 * ```ts
 * const cronark = new Cronark({ store: new SQLiteStore(dbPath) });
 *
 * cronark.addJob(SendEmailsJob, 'mail');
 * cronark.addJob(PurgeBouncesJob, 'mail');
 *
 * await cronark.start('mail');
 * ```
 */
export class Cronark {
  readonly registry: JobRegistry = new JobRegistry();
  readonly catalog: JobCatalog = new JobCatalog();

  private readonly state: WorkerState;
  private readonly monitor: ProcessMonitor;
  private readonly hooks: CronarkHooks;
  private readonly diagnostics: boolean;
  private delay: number = DEFAULT_DELAY_MS;
  private currentWorker: WorkerName | null = null;
  private currentJob: JobType | null = null;

  /**
   * Create a new Cronark instance.
   *
   * @param config - Store, monitor, delay and hooks
   */
  constructor(config: CronarkConfig) {
    this.state = new WorkerState(config.store, this.registry);
    this.monitor = config.monitor ?? new NodeProcessMonitor();
    this.hooks = config.hooks ?? {};
    this.diagnostics = config.diagnostics ?? process.stdout.isTTY === true;

    if (config.delay !== undefined) {
      this.setDelay(config.delay);
    }
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  /**
   * Register a worker with an empty job list if it does not exist yet.
   */
  registerWorker(worker: WorkerName): void {
    this.registry.register(worker);
  }

  /**
   * Add a job to a worker.
   *
   * A class is defined in the catalog under its `jobName` (or class name)
   * first; a string must name a type defined with {@link Cronark.define}.
   *
   * @param job - Job class or job type
   * @param worker - Worker name
   * @param position - 0-based insert position; out of range appends
   */
  addJob(job: JobConstructor | JobType, worker: WorkerName = DEFAULT_WORKER, position = -1): void {
    const jobType = typeof job === 'string' ? job : this.catalog.defineClass(job);
    this.registry.add(jobType, worker, position);
  }

  /**
   * Define the class behind a job type.
   */
  define(jobType: JobType, jobClass: JobConstructor): this {
    this.catalog.define(jobType, jobClass);
    return this;
  }

  /**
   * Job type at a position of a worker (the running worker by default).
   */
  getJob(position: number, worker?: WorkerName | null): JobType | null {
    return this.registry.get(position, worker ?? this.currentWorker ?? DEFAULT_WORKER);
  }

  getCurrentWorker(): WorkerName | null {
    return this.currentWorker;
  }

  getCurrentJob(): JobType | null {
    return this.currentJob;
  }

  // ---------------------------------------------------------------------------
  // Persisted state
  // ---------------------------------------------------------------------------

  getSavedHash(worker: WorkerName = DEFAULT_WORKER): string | null {
    return this.state.getSavedHash(worker);
  }

  saveHash(hash: string | null, worker: WorkerName = DEFAULT_WORKER): boolean {
    return this.state.saveHash(hash, worker);
  }

  hashChanged(worker: WorkerName = DEFAULT_WORKER): boolean {
    return this.state.hashChanged(worker);
  }

  getCurrentIndex(worker: WorkerName = DEFAULT_WORKER): number | null {
    return this.state.getCurrentIndex(worker);
  }

  setCurrentIndex(index: number | null, worker: WorkerName = DEFAULT_WORKER): boolean {
    return this.state.setCurrentIndex(index, worker);
  }

  getPid(worker: WorkerName = DEFAULT_WORKER): Pid | null {
    return this.state.getPid(worker);
  }

  setPid(pid: Pid | null, worker: WorkerName = DEFAULT_WORKER): boolean {
    return this.state.setPid(pid, worker);
  }

  /**
   * Forget everything persisted for a worker.
   */
  resetState(worker: WorkerName = DEFAULT_WORKER): boolean {
    return this.state.clear(worker);
  }

  // ---------------------------------------------------------------------------
  // Delay
  // ---------------------------------------------------------------------------

  /**
   * Set the delay between two jobs in milliseconds. Negative values clamp to 0.
   */
  setDelay(ms: number): this {
    this.delay = Math.max(0, Math.floor(ms));
    return this;
  }

  setDelaySeconds(seconds: number): this {
    return this.setDelay(seconds * 1000);
  }

  getDelay(): number {
    return this.delay;
  }

  // ---------------------------------------------------------------------------
  // Process ownership
  // ---------------------------------------------------------------------------

  /**
   * Whether the stored pid belongs to a live process running the same script.
   *
   * When either script path cannot be determined the worker counts as
   * active, so two workers are never started side by side.
   */
  isActive(worker: WorkerName = DEFAULT_WORKER): boolean {
    const pid = this.state.getPid(worker);

    if (pid === null || !this.monitor.processExists(pid)) {
      return false;
    }

    const currentScriptPath = this.monitor.scriptPathOf(this.monitor.currentProcessId());
    const targetScriptPath = this.monitor.scriptPathOf(pid);

    if (currentScriptPath === null || targetScriptPath === null) {
      return true;
    }

    return currentScriptPath === targetScriptPath;
  }

  /**
   * Terminate the process owning a worker and clear its pid.
   *
   * The pid is also cleared when the process is already gone.
   *
   * @returns false when no pid is stored or the process survived
   */
  kill(worker: WorkerName = DEFAULT_WORKER): boolean {
    const pid = this.state.getPid(worker);

    if (pid === null) {
      return false;
    }

    const terminated = this.monitor.terminate(pid);

    if (terminated || !this.monitor.processExists(pid)) {
      return this.state.setPid(null, worker);
    }

    return false;
  }

  /**
   * Kill every registered worker.
   *
   * @returns Workers whose pid was cleared
   */
  killAll(): WorkerName[] {
    return this.registry.workers().filter((worker) => {
      try {
        return this.kill(worker);
      } catch (error) {
        this.print(`Failed to kill worker: ${toError(error).message}`, worker);
        return false;
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Rotation
  // ---------------------------------------------------------------------------

  /**
   * Advance and persist the circular job index.
   *
   * @returns The new index, or null when there are no jobs or the job list
   *   changed since the hash was saved
   * @throws StateStoreError if the index cannot be saved
   */
  nextIndex(worker: WorkerName = DEFAULT_WORKER): number | null {
    if (!this.registry.hasAny(worker) || this.state.hashChanged(worker)) {
      return null;
    }

    let index = (this.state.getCurrentIndex(worker) ?? -1) + 1;

    if (!this.registry.has(index, worker)) {
      index = 0;
    }

    if (!this.state.setCurrentIndex(index, worker)) {
      throw new StateStoreError(
        `Failed to save job index for worker '${worker}'`,
        worker,
        STATE_KEYS.currentJobIndex
      );
    }

    return index;
  }

  nextJob(worker: WorkerName = DEFAULT_WORKER): JobType | null {
    const index = this.nextIndex(worker);
    return index === null ? null : this.registry.get(index, worker);
  }

  // ---------------------------------------------------------------------------
  // Main loop
  // ---------------------------------------------------------------------------

  /**
   * Claim a worker and run its jobs until superseded.
   *
   * Never rejects: faults are routed to the `onError` hook, and the worker
   * marker is cleared and `onStopped` fired on every exit path.
   *
   * One instance runs one worker at a time; calling `start` while a loop is
   * running returns without side effects.
   */
  async start(worker: WorkerName): Promise<void> {
    if (this.currentWorker !== null) {
      this.print(`Worker '${this.currentWorker}' is already running in this process, ignoring start`, worker);
      return;
    }

    try {
      if (!this.canStart(worker)) {
        this.print(`Worker '${worker}' cannot start (not registered)`, worker);
        return;
      }

      this.currentWorker = worker;
      this.print('Started', worker);
      this.hooks.onStarted?.(worker);

      this.print(`Jobs count: ${this.registry.count(worker)}`, worker);

      const jobsHash = this.registry.hash(worker);
      this.print(`New jobs hash: ${jobsHash}`, worker);
      if (!this.state.saveHash(jobsHash, worker)) {
        this.reportError(
          new StateStoreError(`Can't save jobs hash for worker '${worker}'`, worker, STATE_KEYS.jobsHash),
          worker
        );
        return;
      }

      if (!this.registry.hasAny(worker)) {
        this.print('No jobs found', worker);
        return;
      }

      if (this.isActive(worker)) {
        this.print(`Already running under PID ${this.state.getPid(worker)}, aborting`, worker);
        return;
      }

      const pid = this.monitor.currentProcessId();
      if (!this.state.setPid(pid, worker)) {
        this.print('Failed to save PID', worker);
        this.reportError(new StateStoreError(`Can't save PID for worker '${worker}'`, worker, STATE_KEYS.pid), worker);
        return;
      }

      if (!this.state.setCurrentIndex(null, worker)) {
        this.print('Failed to reset job index', worker);
        this.reportError(
          new StateStoreError(`Can't reset job index for worker '${worker}'`, worker, STATE_KEYS.currentJobIndex),
          worker
        );
        return;
      }

      let jobIndex = this.nextIndex(worker);
      let jobType = jobIndex === null ? null : this.registry.get(jobIndex, worker);
      if (jobType !== null) {
        this.print(`Starting with job index: ${jobIndex}, type: ${jobType}`, worker);
      }

      let isFirst = true;

      while (this.canLoop(jobType, jobIndex, worker, isFirst)) {
        if (isFirst) {
          this.print('Entering loop', worker);
        }

        await this.handle(jobType, jobIndex, worker);

        // Another process overwriting the pid is the stop signal
        if (this.canCheckPid(jobType, jobIndex, worker, isFirst)) {
          const savedPid = this.state.getPid(worker);
          if (savedPid !== pid) {
            this.print(`PID mismatch (saved: ${savedPid}, current: ${pid}), stopping`, worker);
            break;
          }
        }

        jobIndex = this.nextIndex(worker);
        jobType = jobIndex === null ? null : this.registry.get(jobIndex, worker);

        if (jobType === null || jobIndex === null) {
          this.print('No next job, stopping', worker);
          break;
        }

        this.print(`Next job index: ${jobIndex}, type: ${jobType}`, worker);

        if (!this.canResume(jobType, jobIndex, worker)) {
          this.print('Cannot resume loop', worker);
          break;
        }

        this.hooks.onResume?.(jobType, jobIndex, worker, isFirst);
        isFirst = false;

        if (this.delay > 0) {
          await new Promise((resolve) => setTimeout(resolve, this.delay));
        }
      }
    } catch (error) {
      this.reportError(toError(error), worker);
    } finally {
      this.currentWorker = null;
      this.print('Stopped', worker);
      this.runTeardownHook(worker);
      this.print('------------- END -------------', worker);
    }
  }

  /**
   * Construct and run one job.
   *
   * @returns true when the job completed; false when it could not be resolved
   *   or it threw
   */
  async handle(jobType: JobType | null, index: number | null, worker: WorkerName = DEFAULT_WORKER): Promise<boolean> {
    if (jobType === null || index === null || !this.canHandle(jobType, index, worker)) {
      this.print('Cannot handle job (validation failed)', worker);
      return false;
    }

    const jobClass = this.catalog.resolve(jobType);
    if (!jobClass) {
      this.print(`Job type not found: ${jobType}`, worker);
      return false;
    }

    try {
      this.currentJob = jobType;
      this.print('Job initializing...', worker);
      this.hooks.onJobCreating?.(jobType, worker);

      const job = new jobClass(this);

      this.print('Job handling...', worker);
      await job.handle();
      this.print('Job completed', worker);

      return true;
    } catch (error) {
      this.reportError(toError(error), worker);
      return false;
    } finally {
      this.currentJob = null;
    }
  }

  // ---------------------------------------------------------------------------
  // Guards (override to bound or veto the loop)
  // ---------------------------------------------------------------------------

  protected canStart(worker: WorkerName): boolean {
    return this.registry.isRegistered(worker);
  }

  protected canHandle(_jobType: JobType, index: number, worker: WorkerName): boolean {
    return this.registry.has(index, worker);
  }

  protected canLoop(jobType: JobType | null, index: number | null, worker: WorkerName, _isFirst: boolean): boolean {
    return jobType !== null && index !== null && this.registry.has(index, worker);
  }

  protected canCheckPid(_jobType: JobType | null, _index: number | null, _worker: WorkerName, _isFirst: boolean): boolean {
    return true;
  }

  protected canResume(_jobType: JobType, _index: number, _worker: WorkerName): boolean {
    return true;
  }

  // ---------------------------------------------------------------------------
  // Diagnostics
  // ---------------------------------------------------------------------------

  /**
   * Write a diagnostics line prefixed with worker and current job.
   */
  print(message: string, worker?: WorkerName | null): void {
    if (!this.diagnostics) {
      return;
    }

    let prefix = `> ${PRODUCT_NAME}`;

    const name = worker ?? this.currentWorker;
    if (name !== null && name !== undefined) {
      prefix += `::${name}`;
    }

    if (this.currentJob !== null) {
      prefix += `.${this.currentJob}`;
    }

    console.log(`${prefix}:\n  ${message}`);
  }

  private reportError(error: Error, worker: WorkerName): void {
    if (!this.hooks.onError) {
      this.print(`⛔ Error: ${error.message}`, worker);
      return;
    }

    try {
      this.hooks.onError(error, worker);
    } catch (hookError) {
      this.print(`⛔ onError hook failed: ${toError(hookError).message}`, worker);
    }
  }

  private runTeardownHook(worker: WorkerName): void {
    try {
      this.hooks.onStopped?.(worker);
    } catch (hookError) {
      this.reportError(toError(hookError), worker);
    }
  }
}
