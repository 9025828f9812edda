/**
 * Cronark Common Types
 *
 * Shared type definitions used across the library.
 *
 * @packageDocumentation
 */

import type { Cronark } from './core/scheduler.js'

// =============================================================================
// Identifiers
// =============================================================================

/**
 * Name of a worker queue. Case-sensitive.
 */
export type WorkerName = string

/**
 * Identifier of a job class inside the job catalog
 */
export type JobType = string

/**
 * Process identifier as reported by the OS
 */
export type Pid = number

// =============================================================================
// Jobs
// =============================================================================

/**
 * A unit of work. One instance is constructed per turn and handled once.
 *
 * Failure is signalled by throwing (or rejecting).
 */
export interface Job {
  handle(): void | Promise<void>
}

/**
 * Constructor of a job class.
 *
 * The optional static `jobName` is used as the catalog identifier when the
 * class is added directly; the class name is used otherwise.
 */
export interface JobConstructor {
  new (cronark: Cronark): Job
  readonly jobName?: string
}

// =============================================================================
// State Store
// =============================================================================

/**
 * Values a state store can hold
 */
export type StoredValue = string | number | boolean

/**
 * Keys of the persisted per-worker state
 */
export type StateKey = 'jobs_hash' | 'current_job_index' | 'pid'

/**
 * Durable key/value map scoped per worker.
 *
 * Omitting the worker addresses a global scope that never collides with a
 * worker scope.
 */
export interface StateStore {
  /** Read a value, null when absent */
  get(key: string, worker?: WorkerName | null): StoredValue | null
  /** Write a value; null removes the key */
  set(key: string, value: StoredValue | null, worker?: WorkerName | null): boolean
  /** Remove every key of a scope */
  clear(worker?: WorkerName | null): boolean
}

// =============================================================================
// Process Monitor
// =============================================================================

/**
 * OS process primitives consumed by the duplicate-prevention protocol
 */
export interface ProcessMonitor {
  currentProcessId(): Pid
  processExists(pid: Pid): boolean
  /** Path of the script the process runs, null when it cannot be determined */
  scriptPathOf(pid: Pid): string | null
  terminate(pid: Pid): boolean
}

// =============================================================================
// Hooks
// =============================================================================

/**
 * Optional lifecycle callbacks. All are side-effect-only.
 */
export interface CronarkHooks {
  /** Before a job instance is constructed */
  onJobCreating?: (jobType: JobType, worker: WorkerName) => void
  /** After the worker passed registration checks */
  onStarted?: (worker: WorkerName) => void
  /** Before the loop moves to the next job */
  onResume?: (jobType: JobType, index: number, worker: WorkerName, isFirst: boolean) => void
  /** On every exit path of `start()` */
  onStopped?: (worker: WorkerName) => void
  /** Job faults, persistence faults and anything escaping the loop */
  onError?: (error: Error, worker: WorkerName) => void
}
